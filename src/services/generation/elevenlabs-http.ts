import { AxiosError } from 'axios';

export interface ElevenLabsOptions {
  apiKey: string;
  apiUrl: string;
}

/** Map an ElevenLabs HTTP failure onto a short, status-specific error. */
export function toElevenLabsError(error: unknown, action: string): Error {
  if (error instanceof AxiosError) {
    const status = error.response?.status;
    if (status === 401) return new Error('Invalid ElevenLabs API key');
    if (status === 400 || status === 422) return new Error(`Invalid request parameters for ${action}`);
    if (status === 429) return new Error('ElevenLabs rate limit exceeded. Please try again later.');
    if (status !== undefined && status >= 500) return new Error('ElevenLabs service error. Please try again later.');
    return new Error(`Failed to ${action}: ${error.message}`);
  }
  return error instanceof Error ? error : new Error(String(error));
}
