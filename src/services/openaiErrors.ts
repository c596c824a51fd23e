// src/services/openaiErrors.ts
// What: Maps openai SDK failures onto the error taxonomy.
// How: Connection failures and timeouts become BackendConnectionError, HTTP answers HttpStatusError. Anything
//      else (a bug in our own code, an error from a stub client) is returned unchanged.

import OpenAI from 'openai';
import { BackendConnectionError, HttpStatusError } from '../errors.js';

export function fromOpenAIError(url: string, err: unknown): unknown {
  if (err instanceof OpenAI.APIConnectionTimeoutError) return new BackendConnectionError(url, err, true);
  if (err instanceof OpenAI.APIConnectionError) return new BackendConnectionError(url, err);
  if (err instanceof OpenAI.APIError && typeof err.status === 'number') {
    return new HttpStatusError(url, err.status, err.message);
  }
  return err;
}
