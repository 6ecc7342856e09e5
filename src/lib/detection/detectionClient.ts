import axios, { type AxiosInstance, type AxiosResponse } from 'axios';
import { z } from 'zod';
import type { DetectionRequestBody, DetectionResult } from '../../types/detection';
import { RemoteError, TransportError, formatError } from '../errors';
import { createLogger } from '../debugLog';
import { base64ToBytes, bytesToBase64 } from './base64';

const log = createLogger('detection');

export const DetectionResponseSchema = z.object({
  drowsy_detected: z.boolean(),
  confidence: z.number().min(0).max(1),
  processed_image: z.string().nullish()
});

export type DetectionResponse = z.infer<typeof DetectionResponseSchema>;

/** What the capture controller needs from the network side. */
export interface DetectionSubmitter {
  submitFrame(imageBytes: Uint8Array): Promise<DetectionResult>;
}

export type DetectionClientOptions = {
  endpointUrl: string;
  timeoutMs: number;
  /** Injected in tests with a fake adapter. */
  http?: AxiosInstance;
};

/**
 * Map a 200 response body to a DetectionResult.
 * Every failure (bad JSON, missing fields, broken base64) becomes a TransportError.
 */
export function parseDetectionResponse(body: unknown): DetectionResult {
  if (typeof body !== 'string') {
    throw new TransportError('Unexpected response body');
  }

  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch (err) {
    throw new TransportError(`Malformed response: ${formatError(err)}`);
  }

  const parsed = DetectionResponseSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || 'body'}: ${i.message}`).join('; ');
    throw new TransportError(`Malformed response: ${issues}`);
  }

  const { drowsy_detected, confidence, processed_image } = parsed.data;
  const result: DetectionResult = { drowsyDetected: drowsy_detected, confidence };

  // Empty string means "no annotated image"; do not try to decode it.
  if (processed_image) {
    try {
      result.annotatedImage = base64ToBytes(processed_image);
    } catch (err) {
      throw new TransportError(`Could not decode processed image: ${formatError(err)}`);
    }
  }
  return result;
}

export class DetectionClient implements DetectionSubmitter {
  private readonly http: AxiosInstance;

  constructor(private readonly options: DetectionClientOptions) {
    this.http = options.http ?? axios.create({ timeout: options.timeoutMs });
  }

  public async submitFrame(imageBytes: Uint8Array): Promise<DetectionResult> {
    const payload: DetectionRequestBody = { image: bytesToBase64(imageBytes) };
    log.debug(`POST ${this.options.endpointUrl} (${imageBytes.length} bytes)`);

    let response: AxiosResponse<unknown>;
    try {
      response = await this.http.post<unknown>(this.options.endpointUrl, payload, {
        headers: { 'Content-Type': 'application/json' },
        timeout: this.options.timeoutMs,
        responseType: 'text',
        // Keep the raw text: status is checked before any parsing happens.
        transformResponse: [(data: unknown) => data],
        validateStatus: () => true
      });
    } catch (err) {
      throw new TransportError(formatError(err));
    }

    if (response.status !== 200) {
      log.debug(`detection endpoint answered ${response.status}`);
      throw new RemoteError(response.status);
    }

    return parseDetectionResponse(response.data);
  }
}
