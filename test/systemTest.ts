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

import {buildProblem, ContinuousSystem, type EquationsOfMotion, InvalidArgumentError} from '../src'
import assert = require('assert')

describe('ContinuousSystem', () => {
  let rotation: EquationsOfMotion = (du, u) => {
    du[0] = u[1]
    du[1] = -u[0]
  }

  describe('construction', () => {
    let initial = [1, 0]
    let s = new ContinuousSystem(initial, rotation)
    initial[0] = 99
    it('has the dimension of its state', () => assert.strictEqual(s.dimension, 2))
    it('copies the initial state', () => assert.deepStrictEqual(s.state, [1, 0]))
    it('has an empty name by default', () => assert.strictEqual(s.name, ''))
    it('has no Jacobian by default', () => assert.strictEqual(s.hasJacobian(), false))
    it('throws for an empty state', () => assert.throws(() => new ContinuousSystem([], rotation), InvalidArgumentError))
  })
  describe('options', () => {
    let s = new ContinuousSystem([1, 0], rotation, {
      name: 'rotation',
      jacobian: () => [[0, 1], [-1, 0]],
    })
    it('keeps the name', () => assert.strictEqual(s.name, 'rotation'))
    it('has a Jacobian', () => assert.strictEqual(s.hasJacobian(), true))
  })
  describe('state assignment', () => {
    it('accepts a state of the same dimension', () => {
      let s = new ContinuousSystem([1, 0], rotation)
      s.state = [0, 1]
      assert.deepStrictEqual(s.state, [0, 1])
    })
    it('sees components written in place', () => {
      let s = new ContinuousSystem([1, 0], rotation)
      s.state[1] = 2
      assert.deepStrictEqual(s.state, [1, 2])
      assert.strictEqual(s.dimension, 2)
    })
    it('throws for a state of another dimension', () => {
      let s = new ContinuousSystem([1, 0], rotation)
      assert.throws(() => {
        s.state = [1, 2, 3]
      }, /state must have dimension 2, got 3/)
      assert.deepStrictEqual(s.state, [1, 0])
    })
  })
})

describe('buildProblem', () => {
  let decay: EquationsOfMotion = (du, u) => {
    du[0] = -2 * u[0]
  }

  describe('without a Jacobian', () => {
    let s = new ContinuousSystem([3], decay)
    let p = buildProblem(s, 2.5)
    s.state[0] = 7
    it('spans [0, t]', () => assert.deepStrictEqual(p.tspan, [0, 2.5]))
    it('snapshots the initial state', () => assert.deepStrictEqual(p.u0, [3]))
    it('is frozen', () => assert(Object.isFrozen(p) && Object.isFrozen(p.u0)))
    it('has no Jacobian', () => assert.strictEqual(p.jac, undefined))
    it('evaluates the equations of motion in place', () => {
      let du = [0]
      p.f(du, [5], 0.3)
      assert.deepStrictEqual(du, [-10])
    })
  })
  describe('with a Jacobian', () => {
    let s = new ContinuousSystem([3], decay, {jacobian: () => [[-2]]})
    let p = buildProblem(s, 1)
    it('forwards the Jacobian', () => assert.deepStrictEqual(p.jac && p.jac([3], 0), [[-2]]))
  })
})
