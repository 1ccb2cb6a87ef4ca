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

import type {AlgorithmChoice, AlgorithmName} from './algorithms'

export type SolverOptions = {
  abstol: number                       // absolute error tolerance
  reltol: number                       // relative error tolerance
  saveat: readonly number[]            // save exactly at these times (and only these, by default)
  tstops: readonly number[]            // times the integrator must step to exactly
  saveStart: boolean                   // save the initial point
  saveEnd: boolean                     // save the final point
  saveEverystep: boolean               // save after every accepted step
  dt: number                           // initial step size
  maxIters: number                     // maximum number of steps before giving up
  debug: boolean                       // log every step to the console
}

export type SolverConfig = Partial<SolverOptions> & {
  solver?: AlgorithmChoice
}

export const DEFAULT_ALGORITHM: AlgorithmName = 'CashKarp45'

export type ResolvedSolver = {
  algorithm: AlgorithmChoice
  options: Partial<SolverOptions>
}

/**
 * Split a configuration into the algorithm to use and the options to pass
 * on to it. When no solver is named, `DEFAULT_ALGORITHM` is chosen. The
 * returned options never contain the `solver` key, and the configuration
 * passed in is left as it was.
 *
 * The choice is not checked here: an unknown name fails when the integrator
 * is created.
 */
export function resolveSolver(config: SolverConfig): ResolvedSolver {
  const {solver, ...options} = config
  return {
    algorithm: solver ?? DEFAULT_ALGORITHM,
    options,
  }
}
