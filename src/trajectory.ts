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

/**
 * States of a system sampled along a solution, one row per sample time.
 * A trajectory keeps its own copies of the rows it was built from.
 */
export class Trajectory implements Iterable<readonly number[]> {
  private readonly rows: number[][]

  constructor(rows: readonly (readonly number[])[]) {
    if (rows.length > 0) {
      const d = rows[0].length
      for (const r of rows) {
        if (r.length !== d) throw new Error('trajectory rows must all have the same dimension')
      }
    }
    this.rows = rows.map(r => r.slice())
  }

  get length(): number {
    return this.rows.length
  }

  // Dimension of the sampled states, zero for an empty trajectory.
  get dimension(): number {
    return this.rows.length > 0 ? this.rows[0].length : 0
  }

  row(i: number): number[] {
    if (!Number.isInteger(i) || i < 0 || i >= this.rows.length) throw new RangeError(`no row ${i} in trajectory of length ${this.rows.length}`)
    return this.rows[i].slice()
  }

  // The c'th component of every sampled state.
  column(c: number): number[] {
    if (!Number.isInteger(c) || c < 0 || c >= this.dimension) throw new RangeError(`no component ${c} in trajectory of dimension ${this.dimension}`)
    return this.rows.map(r => r[c])
  }

  toArray(): number[][] {
    return this.rows.map(r => r.slice())
  }

  // Iterates over copies of the rows, like row().
  [Symbol.iterator](): Iterator<readonly number[]> {
    return this.toArray()[Symbol.iterator]()
  }
}
