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

import {InvalidArgumentError} from './errors'

// In-place equations of motion: write u' into du. The buffer du belongs to
// the caller and is already sized to the dimension of the system; the value u
// belongs to the integrator and should not be modified.
export type EquationsOfMotion = (du: number[], u: readonly number[]) => void

// Jacobian of the equations of motion, J[i][j] = ∂u'_i/∂u_j.
export type Jacobian = (u: readonly number[]) => number[][]

export type SystemOptions = {
  jacobian?: Jacobian
  name: string
}

/**
 * A continuous dynamical system: a current point in phase space together with
 * the vector field that moves it. The dimension of the system is the length of
 * the initial state and cannot change afterwards.
 *
 * The Jacobian is optional, since only some algorithms make use of it. The name
 * is for display only.
 */
export class ContinuousSystem {
  private u: number[]
  readonly eom: EquationsOfMotion
  readonly jacobian?: Jacobian
  readonly name: string

  /**
   * @param state initial state; copied, so later changes to the array given
   *     here do not affect the system
   * @param eom in-place equations of motion
   * @param options optional Jacobian and display name
   */
  constructor(state: readonly number[], eom: EquationsOfMotion, options: Partial<SystemOptions> = {}) {
    if (state.length === 0) throw new InvalidArgumentError('state must have at least one component')
    this.u = state.slice()
    this.eom = eom
    this.jacobian = options.jacobian
    this.name = options.name ?? ''
  }

  // The current state itself, not a copy. Components may be written in place,
  // but the length must not change.
  get state(): number[] {
    return this.u
  }

  set state(u: number[]) {
    if (u.length !== this.u.length) {
      throw new InvalidArgumentError(`state must have dimension ${this.u.length}, got ${u.length}`)
    }
    this.u = u
  }

  get dimension(): number {
    return this.u.length
  }

  hasJacobian(): boolean {
    return this.jacobian !== undefined
  }
}
