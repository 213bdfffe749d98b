/**
 * Assessments Module
 *
 * Expectations and feedback attached to finished traces.
 *
 * @module assessments
 */

export {
  type LogExpectationParams,
  type LogFeedbackParams,
  type UpdateExpectationParams,
  type UpdateFeedbackParams,
  ASSESSMENT_SOURCE_TYPES,
  buildExpectation,
  buildExpectationUpdate,
  buildFeedback,
  buildFeedbackUpdate,
  isAssessmentSource,
} from './assessment.js';

export {
  type AssessmentClient,
  type AssessmentClientOptions,
  createAssessmentClient,
} from './assessmentClient.js';
