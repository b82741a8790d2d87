import { HttpStatus } from '@nestjs/common';

export type CandidateErrorKind =
  | 'ValidationError'
  | 'InvalidFileType'
  | 'FileTooLarge'
  | 'StorageError'
  | 'CandidateNotFound';

// Status code returned for each error kind
export const CANDIDATE_ERROR_STATUS: Record<CandidateErrorKind, HttpStatus> = {
  ValidationError: HttpStatus.UNPROCESSABLE_ENTITY,
  InvalidFileType: HttpStatus.BAD_REQUEST,
  FileTooLarge: HttpStatus.PAYLOAD_TOO_LARGE,
  StorageError: HttpStatus.INTERNAL_SERVER_ERROR,
  CandidateNotFound: HttpStatus.NOT_FOUND,
};

const MEGABYTE = 1024 * 1024;

/**
 * Every failure the resume service reports to a client.
 * The kind is translated into a status code by the global exception filter.
 */
export class CandidateError extends Error {
  constructor(
    readonly kind: CandidateErrorKind,
    message: string,
    readonly detail?: unknown,
  ) {
    super(message);
    this.name = kind;
  }

  get status(): HttpStatus {
    return CANDIDATE_ERROR_STATUS[this.kind];
  }

  static validation(message: string, detail?: unknown): CandidateError {
    return new CandidateError('ValidationError', message, detail);
  }

  static invalidFileType(
    fileName: string,
    allowedExtensions: readonly string[],
  ): CandidateError {
    return new CandidateError(
      'InvalidFileType',
      `Invalid file type for '${fileName}'`,
      `Allowed types: ${allowedExtensions.join(', ')}`,
    );
  }

  static fileTooLarge(
    fileName: string,
    fileSize: number,
    maxSize: number,
  ): CandidateError {
    return new CandidateError(
      'FileTooLarge',
      `File '${fileName}' size exceeds the maximum limit`,
      `File size: ${(fileSize / MEGABYTE).toFixed(2)} MB, Max allowed: ${(maxSize / MEGABYTE).toFixed(2)} MB`,
    );
  }

  /**
   * Raised when the upload is cut off while it is still streaming in,
   * before its name or full size is known
   */
  static uploadTooLarge(): CandidateError {
    return new CandidateError(
      'FileTooLarge',
      'Uploaded file size exceeds the maximum limit',
    );
  }

  static storage(message: string, detail?: unknown): CandidateError {
    return new CandidateError('StorageError', message, detail);
  }

  static notFound(id: number): CandidateError {
    return new CandidateError(
      'CandidateNotFound',
      `Candidate with ID ${id} not found`,
    );
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
