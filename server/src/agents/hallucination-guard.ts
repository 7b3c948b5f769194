/**
 * Stage A: Hallucination Guard
 *
 * Flags confidently stated, verifiably false technical claims. Runs with no
 * dependency on the Classifier. A flag is only honored together with a
 * correction; without one it is dropped. On failure nothing is flagged.
 */

import type { LanguageModel } from '../lib/llm.js';
import { HALLUCINATION_SYSTEM_PROMPT } from './prompts.js';
import { HallucinationOutputSchema } from './schemas/analysis-schemas.js';
import { requestJson } from './stage.js';
import type { HallucinationResult, SessionSnapshot, StageOutcome } from './types.js';

export function fallbackHallucination(reason: string): HallucinationResult {
  return {
    is_hallucination: false,
    claim: null,
    correction: null,
    confidence: 0.5,
    rationale: `[Fallback] ${reason}; no hallucination assumed`,
  };
}

export class HallucinationGuard {
  constructor(
    private readonly llm: LanguageModel,
    private readonly model: string,
  ) {}

  async check(
    snapshot: SessionSnapshot,
    message: string,
    signal?: AbortSignal,
  ): Promise<StageOutcome<HallucinationResult>> {
    const user = [
      '## Interview context',
      `Position: ${snapshot.profile.role}`,
      `Current topic: ${snapshot.current_topic ?? 'general'}`,
      '',
      '## Message to check',
      `"${message}"`,
    ].join('\n');

    const result = await requestJson(
      this.llm,
      { model: this.model, system: HALLUCINATION_SYSTEM_PROMPT, user, signal },
      HallucinationOutputSchema,
    );
    if (!result.ok) {
      return { kind: 'fallback', value: fallbackHallucination(result.reason), reason: result.reason };
    }

    const { data } = result;
    if (data.is_hallucination && !data.correction) {
      return {
        kind: 'parsed',
        value: {
          is_hallucination: false,
          claim: data.detected_claim,
          correction: null,
          confidence: data.confidence,
          rationale: `${data.reasoning} (flag dropped: no correction given)`.trim(),
        },
      };
    }

    return {
      kind: 'parsed',
      value: {
        is_hallucination: data.is_hallucination,
        claim: data.is_hallucination ? data.detected_claim : null,
        correction: data.is_hallucination ? data.correction : null,
        confidence: data.confidence,
        rationale: data.reasoning,
      },
    };
  }
}
