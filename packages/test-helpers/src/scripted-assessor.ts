/**
 * Scripted assessment collaborator for testing.
 */

import type { AssessmentMode, AssessmentResult, Assessor } from 'sigtrack'
import { ORIGINATOR_KEY } from 'sigtrack'

/**
 * One recorded call to {@link ScriptedAssessor.assess}.
 * @public
 */
export interface AssessmentCall {
  path: string
  mode: AssessmentMode
}

/**
 * An {@link Assessor} that answers from a table instead of running `spctl`.
 *
 * @remarks
 * Paths without a scripted answer are rejected with status 3 and a
 * `rejected` diagnostic, which is how `spctl` reports an unsigned file.
 *
 * @example
 * ```ts
 * const assessor = new ScriptedAssessor()
 * assessor.accept('/Applications/Example.app', 'Developer ID Application: Example (ABCDE12345)')
 * assessor.reject('/Applications/Broken.app', 'a sealed resource is missing or invalid')
 * ```
 *
 * @public
 */
export class ScriptedAssessor implements Assessor {
  readonly #answers = new Map<string, AssessmentResult>()
  readonly #calls: AssessmentCall[] = []

  /** Answer assessments of `path` with success and the given originator. */
  accept(path: string, originator: string): this {
    this.#answers.set(path, {
      status: 0,
      output: { [ORIGINATOR_KEY]: originator, 'assessment:verdict': 'true' },
      diagnostic: `${path}: accepted\norigin=${originator}`,
    })
    return this
  }

  /** Answer assessments of `path` with a non-zero status. */
  reject(path: string, reason: string, status = 3): this {
    this.#answers.set(path, { status, diagnostic: `${path}: rejected\n${reason}` })
    return this
  }

  /** Answer assessments of `path` with an arbitrary result. */
  respond(path: string, result: AssessmentResult): this {
    this.#answers.set(path, result)
    return this
  }

  /** Every call made so far, in order. */
  get calls(): readonly AssessmentCall[] {
    return this.#calls
  }

  assess(path: string, mode: AssessmentMode): Promise<AssessmentResult> {
    this.#calls.push({ path, mode })
    const answer = this.#answers.get(path)
    if (answer === undefined) {
      return Promise.resolve({ status: 3, diagnostic: `${path}: rejected` })
    }
    return Promise.resolve(answer)
  }
}
