import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import * as fs from 'fs';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { UPLOAD_CONFIG, UploadConfig } from '../config/configuration';
import { CandidateError, describeError } from '../common/errors/candidate.error';

/**
 * Resume files on local disk. Holds no state besides its configuration;
 * every stored file lives flat in the upload directory.
 */
@Injectable()
export class FileStorageService implements OnModuleInit {
  private readonly logger = new Logger(FileStorageService.name);

  constructor(
    @Inject(UPLOAD_CONFIG)
    private readonly config: UploadConfig,
  ) {}

  async onModuleInit(): Promise<void> {
    await fs.promises.mkdir(this.config.uploadDir, { recursive: true });
    this.logger.log(`Upload directory ready: ${this.config.uploadDir}`);
  }

  /**
   * Reject anything whose extension is not in the allowed list
   */
  validateFileType(fileName: string): void {
    const ext = path.extname(fileName).toLowerCase();
    if (!this.config.allowedExtensions.includes(ext)) {
      this.logger.warn(`Invalid file type attempted: ${fileName} (${ext || 'none'})`);
      throw CandidateError.invalidFileType(fileName, this.config.allowedExtensions);
    }
  }

  validateFileSize(fileName: string, size: number): void {
    if (size > this.config.maxFileSize) {
      this.logger.warn(
        `File size exceeded: ${fileName} (${size} > ${this.config.maxFileSize} bytes)`,
      );
      throw CandidateError.fileTooLarge(fileName, size, this.config.maxFileSize);
    }
  }

  /**
   * Random name that keeps the original (lower-cased) extension
   */
  generateUniqueFilename(originalName: string): string {
    const ext = path.extname(originalName).toLowerCase();
    return `${uuidv4().replace(/-/g, '')}${ext}`;
  }

  /**
   * Write bytes under a fresh unique name and return that name.
   * A failed write leaves nothing behind.
   */
  async save(buffer: Buffer, originalName: string): Promise<string> {
    const fileName = this.generateUniqueFilename(originalName);
    const filePath = this.resolve(fileName);

    try {
      await fs.promises.writeFile(filePath, buffer);
    } catch (error) {
      this.logger.error(
        `Failed to save file ${originalName}: ${describeError(error)}`,
      );
      await fs.promises.rm(filePath, { force: true }).catch((cleanupError: unknown) => {
        this.logger.warn(
          `Could not remove partial file ${fileName}: ${describeError(cleanupError)}`,
        );
      });
      throw CandidateError.storage('Failed to store resume file', describeError(error));
    }

    this.logger.log(
      `File saved: ${originalName} -> ${fileName} (${(buffer.length / 1024).toFixed(2)} KB)`,
    );
    return fileName;
  }

  /**
   * Delete a stored file. Returns false if it was missing or could not be removed.
   */
  async delete(fileName: string): Promise<boolean> {
    try {
      await fs.promises.unlink(this.resolve(fileName));
      this.logger.log(`File deleted: ${fileName}`);
      return true;
    } catch (error) {
      if (isMissingFile(error)) {
        this.logger.warn(`File not found for deletion: ${fileName}`);
      } else {
        this.logger.error(`Error deleting file ${fileName}: ${describeError(error)}`);
      }
      return false;
    }
  }

  async exists(fileName: string): Promise<boolean> {
    try {
      await fs.promises.access(this.resolve(fileName));
      return true;
    } catch {
      return false;
    }
  }

  resolve(fileName: string): string {
    return path.join(this.config.uploadDir, path.basename(fileName));
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
