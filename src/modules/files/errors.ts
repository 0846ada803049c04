import { AppError } from '../../shared/errors';

export class InvalidMimeTypeError extends AppError {
  constructor(mimeType: string) {
    super('Unsupported file type', 415, { mimeType });
  }
}

export class EmptyFileError extends AppError {
  constructor(message = 'Uploaded file is empty') {
    super(message, 400);
  }
}

export class FileTooLargeError extends AppError {
  constructor(maxBytes: number) {
    super('Uploaded file is too large', 413, { maxBytes });
  }
}

export class StagedFileNotFoundError extends AppError {
  constructor(message = 'File not found') {
    super(message, 404);
  }
}
