/**
 * DivergenceClassifier interface: detects, classifies and resolves remote
 * commits that the local branch lacks.
 */

import type { AssessmentRecord, Mode } from '../../core/types.js'
import type {
  ClassificationResult,
  DivergenceContext,
  DivergenceReport,
  DivergenceResolution,
  HeadVerification,
} from './types.js'

export interface DivergenceClassifier {
  /** Null when there is nothing foreign on the remote or it cannot be read */
  detect(branch: string, cwd: string): Promise<DivergenceReport | null>

  classify(report: DivergenceReport, context: DivergenceContext): Promise<ClassificationResult>

  /** An assessment exists that is strictly newer than every foreign commit */
  isReviewed(report: DivergenceReport, assessment: AssessmentRecord | null): boolean

  resolve(
    report: DivergenceReport,
    classification: ClassificationResult,
    reviewed: boolean,
    mode: Mode,
    context: DivergenceContext
  ): Promise<DivergenceResolution>

  /** detect → classify → reviewed → resolve, after a rejected push */
  handlePushRejection(branch: string, cwd: string, context: DivergenceContext): Promise<DivergenceResolution>

  /** Pre-merge check that the PR head is still the assessed one */
  verifyHead(pr: number, expectedSha: string): Promise<HeadVerification>
}
