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

import {algorithmFor} from './algorithms'
import type {Algorithm, AlgorithmChoice, Stepper} from './algorithms'
import type {SolverOptions} from './config'
import type {ODEProblem} from './problem'

// Saved points of a solution, in integration order: u[i] is the state at t[i].
export type ODESolution = {
  t: number[]
  u: number[][]
}

type IntegratorOptions = Omit<SolverOptions, 'dt'> & {dt?: number}

// Relative distance below which the stepper counts as having reached a stop.
const TIME_EPS = 1e-10

/**
 * A live solution of an ODEProblem, advanced by the caller one step at a time.
 * The integrator always lands exactly on the end of the time span, on every
 * `tstops` time and on every `saveat` time inside it. Points are recorded in
 * `sol` according to the save options.
 */
export class ODEIntegrator {
  private static defaults = {
    abstol: 1e-8,
    reltol: 1e-8,
    maxIters: 100000,
    debug: false,
  }

  readonly problem: ODEProblem
  readonly algorithm: Algorithm
  readonly sol: ODESolution = {t: [], u: []}

  private options: IntegratorOptions
  private stepper: Stepper
  private stops: number[]              // times still to be landed on, in integration order
  private saves: number[]              // saveat times not yet recorded
  private sign: number                 // direction of integration (±1)
  private nStep: number = 0
  private nFree: number = 0            // steps that ended short of a stop
  private done: boolean

  /**
   * @param problem the problem to integrate
   * @param algorithm the algorithm that takes the steps
   * @param options updates to the default options
   */
  constructor(problem: ODEProblem, algorithm: Algorithm, options: Partial<SolverOptions> = {}) {
    const defaults = ODEIntegrator.defaults
    const saveat = options.saveat ?? []
    const sampling = saveat.length > 0
    this.problem = problem
    this.algorithm = algorithm
    this.options = {
      abstol: options.abstol ?? defaults.abstol,
      reltol: options.reltol ?? defaults.reltol,
      saveat: saveat,
      tstops: options.tstops ?? [],
      saveStart: options.saveStart ?? !sampling,
      saveEnd: options.saveEnd ?? !sampling,
      saveEverystep: options.saveEverystep ?? !sampling,
      dt: options.dt,
      maxIters: options.maxIters ?? defaults.maxIters,
      debug: options.debug ?? defaults.debug,
    }

    const [t0, tEnd] = problem.tspan
    if (!Number.isFinite(t0) || !Number.isFinite(tEnd)) throw new Error('tspan must be finite')
    if (!(this.options.maxIters > 0)) throw new Error('maxIters must be positive')
    if (!(this.options.abstol > 0)) throw new Error('abstol must be positive')
    if (!(this.options.reltol >= 0)) throw new Error('reltol must be non-negative')
    if (this.options.dt !== undefined && !(Number.isFinite(this.options.dt) && this.options.dt !== 0)) {
      throw new Error('dt must be a non-zero finite number')
    }
    for (const t of [...this.options.saveat, ...this.options.tstops]) {
      if (!Number.isFinite(t)) throw new Error('saveat and tstops times must be finite')
    }
    if (algorithm.requiresJacobian && !problem.jac) {
      throw new Error(`${algorithm.name} requires a Jacobian, but the problem has none`)
    }

    this.sign = tEnd < t0 ? -1 : 1
    const ahead = (t: number) => this.sign * (t - t0) > 0 && this.sign * (tEnd - t) >= 0
    const inSpan = (t: number) => this.sign * (t - t0) >= 0 && this.sign * (tEnd - t) >= 0
    this.saves = this.ordered(this.options.saveat.filter(inSpan))
    this.stops = this.ordered([...this.options.saveat, ...this.options.tstops, tEnd].filter(ahead))
    this.done = this.stops.length === 0

    this.stepper = algorithm.stepper(problem, {
      abstol: this.options.abstol,
      reltol: this.options.reltol,
      dt: this.options.dt,
      maxIters: this.options.maxIters,
      debug: this.options.debug,
    })

    if (this.options.saveStart) this.save(t0)
    while (this.saves.length > 0 && this.saves[0] === t0) {
      this.save(t0)
      this.saves.shift()
    }
    if (this.done && this.options.saveEnd) this.save(t0)
  }

  get t(): number {
    return this.stepper.t
  }

  get u(): number[] {
    return Array.from(this.stepper.u)
  }

  get steps(): number {
    return this.nStep
  }

  get finished(): boolean {
    return this.done
  }

  /**
   * Advance the solution by one step of the algorithm, never past the next
   * stop. Throws when more than `maxIters` steps have ended short of a stop;
   * steps that land on a `saveat` or `tstops` time are not counted.
   *
   * @returns false once the end of the time span has been reached
   */
  step(): boolean {
    if (this.done) return false
    const tLimit = this.stops[0]
    const tOld = this.stepper.t
    this.stepper.step(tLimit)
    ++this.nStep
    const reached = Math.abs(tLimit - this.stepper.t) <= TIME_EPS * Math.max(1, Math.abs(tLimit))
    if (!reached && this.stepper.t === tOld) {
      throw new Error(`${this.algorithm.name} made no progress at t=${tOld}`)
    }
    const t = reached ? tLimit : this.stepper.t
    this.options.debug && console.log(`#${this.nStep} [${tOld},${t}] dt=${t - tOld}`)

    if (reached) {
      this.stops.shift()
      if (this.saves.length > 0 && this.saves[0] === t) {
        this.save(t)
        this.saves.shift()
      }
      this.done = this.stops.length === 0
    } else {
      ++this.nFree
    }
    if (this.options.saveEverystep || (this.done && this.options.saveEnd)) this.save(t)
    if (!this.done && this.nFree >= this.options.maxIters) {
      throw new Error(`maximum number of iterations (${this.options.maxIters}) exceeded at t=${t}`)
    }
    return !this.done
  }

  /**
   * Step until the end of the time span.
   *
   * @returns the saved points of the solution
   */
  solveToEnd(): ODESolution {
    while (this.step()) {
      // keep stepping
    }
    return this.sol
  }

  // Sort times in the direction of integration, dropping repeats.
  private ordered(times: number[]): number[] {
    const sorted = times.slice().sort((a, b) => this.sign * (a - b))
    return sorted.filter((t, i) => i === 0 || t !== sorted[i - 1])
  }

  // Record the current state at time t, unless t was the last time recorded.
  private save(t: number): void {
    const n = this.sol.t.length
    if (n > 0 && this.sol.t[n - 1] === t) return
    this.sol.t.push(t)
    this.sol.u.push(Array.from(this.stepper.u))
  }
}

/**
 * Create an integrator for `problem`, to be stepped by the caller.
 *
 * @param problem the problem to integrate
 * @param choice registered algorithm name or algorithm
 * @param options updates to the default options
 */
export function init(problem: ODEProblem, choice: AlgorithmChoice, options: Partial<SolverOptions> = {}): ODEIntegrator {
  return new ODEIntegrator(problem, algorithmFor(choice), options)
}

/**
 * Integrate `problem` over its whole time span.
 *
 * @param problem the problem to integrate
 * @param choice registered algorithm name or algorithm
 * @param options updates to the default options
 * @returns the saved points of the solution
 */
export function solve(problem: ODEProblem, choice: AlgorithmChoice, options: Partial<SolverOptions> = {}): ODESolution {
  return init(problem, choice, options).solveToEnd()
}
