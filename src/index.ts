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

export {ContinuousSystem} from './system'
export type {EquationsOfMotion, Jacobian, SystemOptions} from './system'
export {buildProblem} from './problem'
export type {ODEProblem, RightHandSide} from './problem'
export {DEFAULT_ALGORITHM, resolveSolver} from './config'
export type {ResolvedSolver, SolverConfig, SolverOptions} from './config'
export {algorithmFor, cashKarp45, odex} from './algorithms'
export type {Algorithm, AlgorithmChoice, AlgorithmName, CashKarpSettings, OdexSettings, Stepper, StepperOptions} from './algorithms'
export {init, ODEIntegrator, solve} from './solve'
export type {ODESolution} from './solve'
export {computeTrajectory, createIntegrator, evolve, evolveInPlace, getSolution, timeGrid} from './continuous'
export {Trajectory} from './trajectory'
export {InvalidArgumentError} from './errors'
