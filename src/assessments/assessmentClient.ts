/**
 * Assessment Client
 *
 * Direct writes of expectations and feedback to the trace store. These do
 * not go through the export queue: validation errors throw synchronously
 * and store errors reject the returned promise.
 *
 * @module assessments/assessmentClient
 */

import type { Assessment } from '../types/index.js';
import type { TraceStore } from '../store/traceStore.js';
import {
  buildExpectation,
  buildExpectationUpdate,
  buildFeedback,
  buildFeedbackUpdate,
} from './assessment.js';
import type {
  LogExpectationParams,
  LogFeedbackParams,
  UpdateExpectationParams,
  UpdateFeedbackParams,
} from './assessment.js';

export interface AssessmentClient {
  logExpectation(params: LogExpectationParams): Promise<Assessment>;
  logFeedback(params: LogFeedbackParams): Promise<Assessment>;
  updateExpectation(params: UpdateExpectationParams): Promise<Assessment>;
  updateFeedback(params: UpdateFeedbackParams): Promise<Assessment>;
  deleteExpectation(params: { traceId: string; assessmentId: string }): Promise<void>;
  deleteFeedback(params: { traceId: string; assessmentId: string }): Promise<void>;
}

export interface AssessmentClientOptions {
  now?: () => number;
}

export function createAssessmentClient(
  store: TraceStore,
  options: AssessmentClientOptions = {},
): AssessmentClient {
  const now = options.now ?? Date.now;

  // Validation runs before the first await so bad parameters throw instead of rejecting
  return {
    logExpectation(params: LogExpectationParams): Promise<Assessment> {
      return store.createAssessment(buildExpectation(params, now()));
    },

    logFeedback(params: LogFeedbackParams): Promise<Assessment> {
      return store.createAssessment(buildFeedback(params, now()));
    },

    updateExpectation(params: UpdateExpectationParams): Promise<Assessment> {
      return store.updateAssessment(buildExpectationUpdate(params));
    },

    updateFeedback(params: UpdateFeedbackParams): Promise<Assessment> {
      return store.updateAssessment(buildFeedbackUpdate(params));
    },

    deleteExpectation({ traceId, assessmentId }): Promise<void> {
      return store.deleteAssessment(traceId, assessmentId);
    },

    deleteFeedback({ traceId, assessmentId }): Promise<void> {
      return store.deleteAssessment(traceId, assessmentId);
    },
  };
}
