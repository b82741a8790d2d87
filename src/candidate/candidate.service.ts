import { Injectable, Logger } from '@nestjs/common';
import { Candidate, NewCandidate } from '../database/entities';
import { CandidateStore } from '../database/candidate.store';
import { FileStorageService } from '../storage/file-storage.service';
import { CandidateError, describeError } from '../common/errors/candidate.error';
import {
  CandidateFilter,
  hasActiveFilter,
  matchesCandidateFilter,
  parseSkillSet,
} from './candidate.filter';

// Submitted metadata; skillSet is still the raw comma-separated input
export type CandidateMetadata = Omit<NewCandidate, 'skillSet' | 'resumeFilename'> & {
  skillSet: string;
};

@Injectable()
export class CandidateService {
  private readonly logger = new Logger(CandidateService.name);

  constructor(
    private readonly candidateStore: CandidateStore,
    private readonly fileStorage: FileStorageService,
  ) {}

  /**
   * Validate the upload, write the resume to disk and store the candidate.
   * If storing the record fails, the written file is removed again.
   */
  async submit(
    metadata: CandidateMetadata,
    fileBytes: Buffer,
    fileName: string,
  ): Promise<Candidate> {
    this.logger.log(`Creating candidate: ${metadata.fullName}`);

    this.fileStorage.validateFileType(fileName);
    this.fileStorage.validateFileSize(fileName, fileBytes.length);

    const skillSet = parseSkillSet(metadata.skillSet);
    if (skillSet.length === 0) {
      throw CandidateError.validation('At least one valid skill must be provided', [
        { field: 'skill_set', message: 'skill_set must contain at least one skill' },
      ]);
    }

    const resumeFilename = await this.fileStorage.save(fileBytes, fileName);

    try {
      const candidate = await this.candidateStore.insert({
        ...metadata,
        skillSet,
        resumeFilename,
      });

      this.logger.log(
        `Candidate created successfully: ID=${candidate.id}, Name=${candidate.fullName}`,
      );
      return candidate;
    } catch (error) {
      await this.fileStorage.delete(resumeFilename);
      this.logger.error(
        `Cleaned up file after failed candidate creation: ${resumeFilename}`,
      );
      throw error instanceof CandidateError
        ? error
        : CandidateError.storage('Failed to create candidate record', describeError(error));
    }
  }

  async find(id: number): Promise<Candidate> {
    const candidate = await this.candidateStore.get(id);

    if (!candidate) {
      throw CandidateError.notFound(id);
    }

    return candidate;
  }

  /**
   * Candidates matching every given filter, in upload order
   */
  async query(filter: CandidateFilter = {}): Promise<Candidate[]> {
    if (
      filter.minExperience !== undefined &&
      filter.maxExperience !== undefined &&
      filter.maxExperience < filter.minExperience
    ) {
      throw CandidateError.validation(
        'max_experience must be greater than or equal to min_experience',
      );
    }

    const candidates = hasActiveFilter(filter)
      ? await this.candidateStore.list((candidate) =>
          matchesCandidateFilter(candidate, filter),
        )
      : await this.candidateStore.list();

    this.logger.debug(
      `Listed candidates: skill=${filter.skill}, min_exp=${filter.minExperience}, ` +
        `max_exp=${filter.maxExperience}, grad_year=${filter.graduationYear}, count=${candidates.length}`,
    );
    return candidates;
  }

  /**
   * Remove the record, then its resume file. A file that cannot be
   * deleted is logged and does not fail the removal.
   */
  async remove(id: number): Promise<Candidate> {
    this.logger.log(`Deleting candidate: ID=${id}`);

    const candidate = await this.candidateStore.delete(id);
    if (!candidate) {
      throw CandidateError.notFound(id);
    }

    const fileDeleted = await this.fileStorage.delete(candidate.resumeFilename);
    if (!fileDeleted) {
      this.logger.warn(
        `Resume file not removed for candidate ${id}: ${candidate.resumeFilename}`,
      );
    }

    return candidate;
  }

  async getStatistics(): Promise<{ total_candidates: number }> {
    return { total_candidates: await this.candidateStore.count() };
  }
}
