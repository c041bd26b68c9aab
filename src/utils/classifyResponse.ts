import { z } from 'zod';
import { ApiFaultError } from '../error/apiFaultError.js';
import { HTTPError } from '../error/httpError.js';
import { tryParse } from './tryParse.js';
import { validatorSync } from './validator.js';
import type { SafeWrap } from './wrap.js';

/** Wire shape of a PUG REST fault document. */
export const faultBodySchema = z.object({
  Fault: z.object({
    Code: z.string(),
    Message: z.string(),
    Details: z.array(z.string()).optional(),
  }),
});

/** What a response turned out to be, judged from status and body only. */
export type ResponseOutcome =
  | { kind: 'success'; status: number; body: string }
  | { kind: 'fault'; status: number; code: string; message: string; details: string[] }
  | { kind: 'status'; status: number; body: string };

/** Status and body of a response classified as success. */
export interface SuccessBody {
  status: number;
  body: string;
}

/** True for statuses in the 2xx range. */
export function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 300;
}

/**
 * Classify a response. A body is a fault only when it is JSON with a top-level
 * `Fault` object carrying string `Code` and `Message`; anything else falls back to
 * success (2xx) or a plain status outcome. Never throws.
 */
export function classifyResponse(status: number, body: string): ResponseOutcome {
  const [errParse, parsed] = tryParse(body);
  if (!errParse) {
    const [errFault, fault] = validatorSync(parsed, faultBodySchema);
    if (!errFault) {
      return {
        kind: 'fault',
        status,
        code: fault.Fault.Code,
        message: fault.Fault.Message,
        details: fault.Fault.Details ?? [],
      };
    }
  }

  if (isSuccessStatus(status)) {
    return { kind: 'success', status, body };
  }

  return { kind: 'status', status, body };
}

/** Convert an outcome into a tuple: faults and failed statuses become errors. */
export function outcomeToResult(outcome: ResponseOutcome): SafeWrap<ApiFaultError | HTTPError, SuccessBody> {
  switch (outcome.kind) {
    case 'success':
      return [null, { status: outcome.status, body: outcome.body }];
    case 'fault':
      return [
        new ApiFaultError({ code: outcome.code, message: outcome.message, details: outcome.details }, outcome.status),
        null,
      ];
    case 'status':
      return [new HTTPError(outcome.status, outcome.body), null];
  }
}
