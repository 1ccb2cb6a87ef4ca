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

import ode45 = require('ode45-cash-karp')
import {Outcome, Solver} from 'odex'
import type {ODEProblem} from './problem'

// Options every algorithm receives from the integrator, after defaults are applied.
export type StepperOptions = {
  abstol: number
  reltol: number
  dt?: number                          // initial step size; sign is ignored
  maxIters: number
  debug: boolean
}

// A running solution of one problem. u belongs to the stepper: copy it
// before keeping it.
export interface Stepper {
  readonly t: number
  readonly u: readonly number[]
  // Take at least one accepted step, never past tLimit.
  step(tLimit: number): void
}

export interface Algorithm {
  readonly name: string
  readonly requiresJacobian: boolean
  stepper(problem: ODEProblem, options: StepperOptions): Stepper
}

export type AlgorithmName = 'CashKarp45' | 'Odex'

// Any string is accepted here; names outside the registry fail in algorithmFor.
export type AlgorithmChoice = AlgorithmName | (string & {}) | Algorithm

export type CashKarpSettings = {
  maxIncreaseFactor: number
  maxDecreaseFactor: number
  dtMinMag: number
  dtMaxMag: number
}

export type OdexSettings = {
  maxExtrapolationColumns: number
  stepSizeSequence: number
}

const DEFAULT_INITIAL_STEP = 1e-3

function direction(problem: ODEProblem): number {
  const [t0, tEnd] = problem.tspan
  return tEnd < t0 ? -1 : 1
}

/**
 * Adaptive explicit Runge-Kutta 4(5) with the Cash-Karp coefficients, from the
 * ode45-cash-karp package. A step is accepted when the estimated local error
 * of every component i stays below `abstol + reltol * |u_i|`.
 */
export function cashKarp45(settings: Partial<CashKarpSettings> = {}): Algorithm {
  return {
    name: 'CashKarp45',
    requiresJacobian: false,
    stepper(problem: ODEProblem, options: StepperOptions): Stepper {
      const f = problem.f
      const {abstol, reltol} = options
      const dt0 = direction(problem) * Math.abs(options.dt ?? DEFAULT_INITIAL_STEP)
      const integrator = ode45(problem.u0.slice(), (dydt, y, t) => f(dydt, y, t), problem.tspan[0], dt0, {
        ...settings,
        tol: 1,
        errorScaleFunction: (i, dt, y) => abstol + reltol * Math.abs(y),
        verbose: options.debug,
      })
      return {
        get t() {
          return integrator.t
        },
        get u() {
          return integrator.y
        },
        step(tLimit: number) {
          // The library only clamps the step it takes, not its stored dt, and
          // skips the step outright once dt * 1e-10 exceeds the remaining gap.
          const gap = tLimit - integrator.t
          if (Math.abs(integrator.dt) > Math.abs(gap)) integrator.dt = gap
          integrator.step(tLimit)
        },
      }
    },
  }
}

/**
 * Gragg-Bulirsch-Stoer extrapolation (ODEX of Hairer and Wanner), from the odex
 * package. Each call to `step` integrates all the way to `tLimit`, so a
 * solution saved at every step holds only the points the integrator was asked
 * to stop at.
 */
export function odex(settings: Partial<OdexSettings> = {}): Algorithm {
  return {
    name: 'Odex',
    requiresJacobian: false,
    stepper(problem: ODEProblem, options: StepperOptions): Stepper {
      const n = problem.u0.length
      const f = problem.f
      const solver = new Solver(n)
      solver.absoluteTolerance = options.abstol
      solver.relativeTolerance = options.reltol
      solver.maxSteps = options.maxIters
      if (options.dt !== undefined) solver.initialStepSize = Math.abs(options.dt)
      if (settings.maxExtrapolationColumns !== undefined) solver.maxExtrapolationColumns = settings.maxExtrapolationColumns
      if (settings.stepSizeSequence !== undefined) solver.stepSizeSequence = settings.stepSizeSequence
      let t = problem.tspan[0]
      let u = problem.u0.slice()
      const derivative = (x: number, y: number[]) => {
        const dy: number[] = Array(n).fill(0)
        f(dy, y, x)
        return dy
      }
      return {
        get t() {
          return t
        },
        get u() {
          return u
        },
        step(tLimit: number) {
          const result = solver.solve(derivative, t, u, tLimit)
          if (result.outcome !== Outcome.Converged) {
            throw new Error(`odex: integration from t=${t} to t=${tLimit} stopped (${Outcome[result.outcome]})`)
          }
          t = tLimit
          u = result.y
        },
      }
    },
  }
}

const registry: {[name in AlgorithmName]: () => Algorithm} = {
  CashKarp45: () => cashKarp45(),
  Odex: () => odex(),
}

function isAlgorithmName(name: string): name is AlgorithmName {
  return Object.prototype.hasOwnProperty.call(registry, name)
}

/**
 * Turn an algorithm choice into an algorithm. Names are looked up in the
 * registry of bundled algorithms; algorithm objects are returned as they are.
 *
 * @param choice registered name or algorithm
 * @returns the algorithm
 */
export function algorithmFor(choice: AlgorithmChoice): Algorithm {
  if (typeof choice !== 'string') return choice
  if (!isAlgorithmName(choice)) throw new Error(`unknown algorithm ${JSON.stringify(choice)}`)
  return registry[choice]()
}
