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

import type {ContinuousSystem} from './system'

// Right-hand side in the form the solvers call it: du = f(u, t), written in place.
export type RightHandSide = (du: number[], u: readonly number[], t: number) => void

export type ODEProblem = Readonly<{
  f: RightHandSide
  u0: readonly number[]
  tspan: readonly [number, number]
  jac?: (u: readonly number[], t: number) => number[][]
}>

/**
 * Describe the initial value problem of evolving `system` from time zero to
 * `t`. The initial condition is a snapshot of the current state: evolving
 * the system afterwards does not change the problem, and solving the problem
 * does not change the system.
 *
 * @param system the system to integrate
 * @param t end of the integration interval [0, t]
 */
export function buildProblem(system: ContinuousSystem, t: number): ODEProblem {
  const eom = system.eom
  const jacobian = system.jacobian
  return Object.freeze({
    f: (du: number[], u: readonly number[]) => eom(du, u),
    u0: Object.freeze(system.state.slice()),
    tspan: Object.freeze([0, t] as const),
    jac: jacobian && ((u: readonly number[]) => jacobian(u)),
  })
}
