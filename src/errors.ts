/**
 * Error taxonomy for the voice match core.
 *
 * Validation and enrollment errors reach the caller unchanged. The two
 * *Unavailable errors are recovered inside the decision engine and never
 * escape an authentication request. StorageFailure is fatal to the request.
 */

export type VoiceMatchErrorCode =
  | 'INVALID_FEATURE_VECTOR'
  | 'PROFILE_NOT_FOUND'
  | 'PROFILE_INACTIVE'
  | 'DUPLICATE_USERNAME'
  | 'ENROLLMENT_SESSION_NOT_FOUND'
  | 'TRANSCRIPTION_UNAVAILABLE'
  | 'ANALYSIS_UNAVAILABLE'
  | 'STORAGE_FAILURE';

export class VoiceMatchError extends Error {
  constructor(
    public readonly code: VoiceMatchErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidFeatureVector extends VoiceMatchError {
  constructor(message: string, public readonly issues: readonly string[] = []) {
    super('INVALID_FEATURE_VECTOR', issues.length ? `${message}: ${issues.join('; ')}` : message);
  }
}

export class ProfileNotFound extends VoiceMatchError {
  constructor(public readonly profileRef: string) {
    super('PROFILE_NOT_FOUND', `Profile not found: ${profileRef}`);
  }
}

export class ProfileInactive extends VoiceMatchError {
  constructor(public readonly userId: string) {
    super('PROFILE_INACTIVE', `Profile is deactivated: ${userId}`);
  }
}

export class DuplicateUsername extends VoiceMatchError {
  constructor(public readonly username: string) {
    super('DUPLICATE_USERNAME', `Username '${username}' already exists`);
  }
}

export class EnrollmentSessionNotFound extends VoiceMatchError {
  constructor(public readonly sessionId: string) {
    super('ENROLLMENT_SESSION_NOT_FOUND', `Enrollment session not found or already closed: ${sessionId}`);
  }
}

export class TranscriptionUnavailable extends VoiceMatchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('TRANSCRIPTION_UNAVAILABLE', message, options);
  }
}

export class AnalysisUnavailable extends VoiceMatchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('ANALYSIS_UNAVAILABLE', message, options);
  }
}

export class StorageFailure extends VoiceMatchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('STORAGE_FAILURE', message, options);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
