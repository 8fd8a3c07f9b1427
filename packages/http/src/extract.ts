/**
 * @ipscout/http - Address extraction from response bodies
 */

import type { ExtractMethod } from './details.js';

const JSON_IP_FIELD_RE = /"ip"\s*:\s*"(.+?)"/i;

/**
 * Pull the address candidate out of a response body. Returns `undefined`
 * when the body holds nothing that could be an address; the candidate itself
 * is still unparsed.
 */
export function extractCandidate(body: string, method: ExtractMethod): string | undefined {
  let candidate: string | undefined;

  switch (method) {
    case 'plain-text':
      candidate = body.trim();
      break;
    case 'strip-double-quotes':
      candidate = body.trim().replace(/^"+|"+$/g, '');
      break;
    case 'json-ip-field':
      candidate = JSON_IP_FIELD_RE.exec(body)?.[1];
      break;
  }

  return candidate === undefined || candidate.trim() === '' ? undefined : candidate;
}
