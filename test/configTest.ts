/**
 * This work carries the BSD 2-clause license.
 *
 * Copyright (c) 2016-2023 Colin Smith.
 * 1. Redistributions of source code must retain the above copyright notice, this list of conditions and the following
 * disclaimer.
 * 2. Redistributions in binary form must reproduce the above copyright notice, this list of conditions and the
 * following disclaimer in the documentation and/or other materials provided with the distribution.
 *
 * THIS SOFTWARE IS PROVIDED BY THE COPYRIGHT HOLDERS AND CONTRIBUTORS "AS IS" AND ANY EXPRESS OR IMPLIED WARRANTIES,
 * INCLUDING, BUT NOT LIMITED TO, THE IMPLIED WARRANTIES OF MERCHANTABILITY AND FITNESS FOR A PARTICULAR PURPOSE
 * ARE DISCLAIMED. IN NO EVENT SHALL THE COPYRIGHT HOLDER OR CONTRIBUTORS BE LIABLE FOR ANY DIRECT, INDIRECT,
 * INCIDENTAL, SPECIAL, EXEMPLARY, OR CONSEQUENTIAL DAMAGES (INCLUDING, BUT NOT LIMITED TO, PROCUREMENT OF SUBSTITUTE
 * GOODS OR SERVICES; LOSS OF USE, DATA, OR PROFITS; OR BUSINESS INTERRUPTION) HOWEVER CAUSED AND ON ANY THEORY OF
 * LIABILITY, WHETHER IN CONTRACT, STRICT LIABILITY, OR TORT (INCLUDING NEGLIGENCE OR OTHERWISE) ARISING IN ANY WAY
 * OUT OF THE USE OF THIS SOFTWARE, EVEN IF ADVISED OF THE POSSIBILITY OF SUCH DAMAGE.
 */

import {type Algorithm, cashKarp45, DEFAULT_ALGORITHM, resolveSolver, type SolverConfig} from '../src'
import assert = require('assert')

describe('resolveSolver', () => {
  describe('without a solver', () => {
    let config: SolverConfig = {abstol: 1e-9, saveat: [0, 1]}
    let {algorithm, options} = resolveSolver(config)
    it('chooses the default algorithm', () => assert.strictEqual(algorithm, DEFAULT_ALGORITHM))
    it('default is CashKarp45', () => assert.strictEqual(DEFAULT_ALGORITHM, 'CashKarp45'))
    it('keeps the other options', () => assert.deepStrictEqual(options, {abstol: 1e-9, saveat: [0, 1]}))
  })
  describe('with a solver name', () => {
    let config: SolverConfig = {solver: 'Odex', reltol: 1e-6}
    let {algorithm, options} = resolveSolver(config)
    it('chooses the named algorithm', () => assert.strictEqual(algorithm, 'Odex'))
    it('removes the solver from the options', () => assert.deepStrictEqual(options, {reltol: 1e-6}))
    it('leaves the configuration as it was', () => assert.deepStrictEqual(config, {solver: 'Odex', reltol: 1e-6}))
  })
  describe('with an algorithm object', () => {
    let custom: Algorithm = cashKarp45({maxIncreaseFactor: 2})
    let {algorithm, options} = resolveSolver({solver: custom})
    it('passes the algorithm through', () => assert.strictEqual(algorithm, custom))
    it('leaves no options', () => assert.deepStrictEqual(options, {}))
  })
  describe('with a name outside the registry', () => {
    let {algorithm} = resolveSolver({solver: 'Tsit5'})
    it('does not check the name', () => assert.strictEqual(algorithm, 'Tsit5'))
  })
  describe('with an undefined solver', () => {
    let {algorithm, options} = resolveSolver({solver: undefined, dt: 0.1})
    it('chooses the default algorithm', () => assert.strictEqual(algorithm, DEFAULT_ALGORITHM))
    it('removes the solver key', () => assert.deepStrictEqual(options, {dt: 0.1}))
  })
})
