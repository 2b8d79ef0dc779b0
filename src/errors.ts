import { z } from "zod";

export class AuthenticationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "AuthenticationError";
  }
}

export class InvalidChoiceError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidChoiceError";
  }
}

export class NoActiveDeviceError extends Error {
  constructor(message = "No active device found. Start playback on a Spotify app or speaker and try again.") {
    super(message);
    this.name = "NoActiveDeviceError";
  }
}

export class RemoteApiError extends Error {
  constructor(message: string, readonly statusCode?: number) {
    super(message);
    this.name = "RemoteApiError";
  }
}

export class EndOfInputError extends Error {
  constructor() {
    super("Input stream closed");
    this.name = "EndOfInputError";
  }
}

// Shape of the errors thrown by spotify-web-api-node (WebapiError and subclasses).
const webApiErrorSchema = z.object({
  message: z.string().optional(),
  statusCode: z.number().optional(),
  headers: z.record(z.unknown()).optional(),
  body: z
    .object({
      error: z
        .union([
          z.string(),
          z.object({
            status: z.number().optional(),
            message: z.string().optional(),
            reason: z.string().optional()
          })
        ])
        .optional(),
      error_description: z.string().optional()
    })
    .optional()
});

type WebApiError = z.infer<typeof webApiErrorSchema>;

function describeBody(error: WebApiError): { message?: string; reason?: string } {
  const apiError = error.body?.error;
  if (typeof apiError === "string") {
    return { message: error.body?.error_description ?? apiError };
  }
  return { message: apiError?.message, reason: apiError?.reason };
}

function retryAfterSeconds(headers: Record<string, unknown> | undefined): string | null {
  const value = headers?.["retry-after"];
  if (typeof value === "string" || typeof value === "number") {
    return String(value);
  }
  return null;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function describeError(error: unknown): string {
  const parsed = webApiErrorSchema.safeParse(error);
  if (parsed.success && parsed.data.statusCode !== undefined) {
    return classifyRemoteError(error).message;
  }
  return errorMessage(error);
}

export function classifyRemoteError(error: unknown): NoActiveDeviceError | RemoteApiError {
  if (error instanceof NoActiveDeviceError || error instanceof RemoteApiError) {
    return error;
  }

  const parsed = webApiErrorSchema.safeParse(error);
  if (!parsed.success || parsed.data.statusCode === undefined) {
    return new RemoteApiError(`Request to Spotify failed: ${errorMessage(error)}`);
  }

  const { statusCode } = parsed.data;
  const { message, reason } = describeBody(parsed.data);

  if (reason === "NO_ACTIVE_DEVICE" || (statusCode === 404 && /no active device/i.test(message ?? ""))) {
    return new NoActiveDeviceError();
  }
  if (reason === "PREMIUM_REQUIRED") {
    return new RemoteApiError("Spotify Premium is required to control playback.", statusCode);
  }
  if (statusCode === 429) {
    const retryAfter = retryAfterSeconds(parsed.data.headers);
    const suffix = retryAfter ? ` Retry after ${retryAfter}s.` : "";
    return new RemoteApiError(`Rate limited by Spotify.${suffix}`, statusCode);
  }
  if (statusCode === 401) {
    return new RemoteApiError("Spotify rejected the access token. Restart the player to sign in again.", statusCode);
  }

  return new RemoteApiError(`Spotify API error ${statusCode}: ${message ?? parsed.data.message ?? "unknown error"}`, statusCode);
}
