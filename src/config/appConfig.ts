import { z } from 'zod';
import type { CameraSelection, ImageSourcePreference } from '../types/detection';

export const DEFAULT_ENDPOINT_URL = 'http://localhost:5000/api/detect_drowsiness';
export const DEFAULT_REQUEST_TIMEOUT_MS = 15000;

export type AppConfig = {
  endpointUrl: string;
  cameraSelection: CameraSelection;
  /** When true, finding no camera at startup is fatal instead of a retryable failure. */
  requireCamera: boolean;
  imageSource: ImageSourcePreference;
  requestTimeoutMs: number;
};

/** Raw build-time variables, e.g. `import.meta.env`. Non-string entries are ignored. */
export type AppEnv = Record<string, unknown>;

const BooleanFlag = z.enum(['true', 'false', '1', '0']).transform((v) => v === 'true' || v === '1');

const EnvSchema = z.object({
  VITE_DETECT_API_URL: z.string().url().default(DEFAULT_ENDPOINT_URL),
  VITE_CAMERA_SELECTION: z.enum(['first', 'front']).default('first'),
  VITE_REQUIRE_CAMERA: BooleanFlag.default('false'),
  VITE_IMAGE_SOURCE: z.enum(['auto', 'camera', 'file']).default('auto'),
  VITE_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_REQUEST_TIMEOUT_MS)
});

export class AppConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AppConfigError';
  }
}

function stringEntries(env: AppEnv): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    // Unset Vite variables may come through as empty strings.
    if (typeof value === 'string' && value.trim() !== '') out[key] = value.trim();
  }
  return out;
}

export function resolveAppConfig(env: AppEnv): AppConfig {
  const parsed = EnvSchema.safeParse(stringEntries(env));
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new AppConfigError(`Invalid app configuration: ${issues}`);
  }

  const e = parsed.data;
  return {
    endpointUrl: e.VITE_DETECT_API_URL,
    cameraSelection: e.VITE_CAMERA_SELECTION,
    requireCamera: e.VITE_REQUIRE_CAMERA,
    imageSource: e.VITE_IMAGE_SOURCE,
    requestTimeoutMs: e.VITE_REQUEST_TIMEOUT_MS
  };
}
