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

import {resolveSolver} from './config'
import type {SolverConfig} from './config'
import {InvalidArgumentError} from './errors'
import {buildProblem} from './problem'
import type {ODEProblem} from './problem'
import {init, ODEIntegrator, solve} from './solve'
import type {ContinuousSystem} from './system'
import {Trajectory} from './trajectory'

// Tolerance, relative to the number of steps, for T landing on a multiple of dt.
const GRID_EPS = 1e-10

/**
 * Create an integrator over [0, t] starting from the current state of
 * `system`, for the caller to step. Neither the initial point nor the
 * intermediate steps are saved.
 *
 * The `solver` entry of `config` picks the algorithm (`DEFAULT_ALGORITHM` when
 * absent); the remaining entries are passed to the integrator.
 */
export function createIntegrator(system: ContinuousSystem, t: number, config: SolverConfig = {}): ODEIntegrator {
  const problem = buildProblem(system, t)
  const {algorithm, options} = resolveSolver(config)
  return init(problem, algorithm, {...options, saveStart: false, saveEverystep: false})
}

/**
 * Solve `problem` without saving every step.
 *
 * @returns the saved states, in order: the initial and final states, or the
 *     states at the `saveat` times when those are given
 */
export function getSolution(problem: ODEProblem, config: SolverConfig = {}): number[][] {
  const {algorithm, options} = resolveSolver(config)
  return solve(problem, algorithm, {...options, saveEverystep: false}).u
}

/**
 * Evolve the system for a time `t` and return the final state. The state of
 * the system itself is not changed.
 */
export function evolve(system: ContinuousSystem, t: number = 1.0, config: SolverConfig = {}): number[] {
  const u = getSolution(buildProblem(system, t), config)
  if (u.length === 0) throw new Error('the solver saved no states')
  return u[u.length - 1]
}

/**
 * Evolve the system for a time `t`, replacing its state with the final state.
 *
 * @returns the new state
 */
export function evolveInPlace(system: ContinuousSystem, t: number = 1.0, config: SolverConfig = {}): number[] {
  system.state = evolve(system, t, config)
  return system.state
}

/**
 * The uniform time grid 0, dt, 2dt, ... up to `T`. `T` itself is included
 * when it is a multiple of `dt`.
 */
export function timeGrid(T: number, dt: number): number[] {
  const n = Math.floor(T / dt + GRID_EPS * Math.max(1, T / dt))
  const grid: number[] = []
  for (let i = 0; i <= n; ++i) grid.push(Math.min(i * dt, T))
  return grid
}

/**
 * Sample the evolution of the system at the times 0, dt, 2dt, ... up to `T`.
 * Any `saveat` in `config` is replaced by that grid. The state of the system
 * is not changed.
 *
 * @param system the system to evolve
 * @param T total time, must be positive and finite
 * @param dt sampling interval, must be positive
 * @param config solver choice and options
 * @returns the states at the grid times, one row per time
 */
export function computeTrajectory(system: ContinuousSystem, T: number, dt: number = 0.05, config: SolverConfig = {}): Trajectory {
  if (!(T > 0)) throw new InvalidArgumentError('total time `T` must be positive')
  if (!Number.isFinite(T)) throw new InvalidArgumentError('total time `T` must be finite')
  if (!(dt > 0)) throw new InvalidArgumentError('sampling interval `dt` must be positive')
  const problem = buildProblem(system, T)
  return new Trajectory(getSolution(problem, {...config, saveat: timeGrid(T, dt)}))
}
