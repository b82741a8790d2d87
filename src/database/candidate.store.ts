import { Injectable, Logger } from '@nestjs/common';
import { Candidate, NewCandidate } from './entities';

export type CandidatePredicate = (candidate: Candidate) => boolean;

/**
 * In-memory candidate store.
 *
 * Every operation runs behind a single async lock so id allocation and
 * map mutations are serialized. The lock only ever covers in-memory work;
 * callers do their file I/O outside of it.
 */
@Injectable()
export class CandidateStore {
  private readonly logger = new Logger(CandidateStore.name);

  private readonly records = new Map<number, Candidate>();
  private nextId = 1;

  // Tail of the lock queue; each caller waits on the one before it
  private tail: Promise<unknown> = Promise.resolve();

  /**
   * Assign the next id, stamp the creation time and store the record
   */
  async insert(data: NewCandidate): Promise<Candidate> {
    return this.withLock(() => {
      const candidate: Candidate = {
        ...data,
        skillSet: [...data.skillSet],
        id: this.nextId,
        createdAt: new Date(),
      };
      this.nextId += 1;
      this.records.set(candidate.id, candidate);

      this.logger.log(
        `Candidate created: ID=${candidate.id}, Name=${candidate.fullName}`,
      );
      return copy(candidate);
    });
  }

  async get(id: number): Promise<Candidate | undefined> {
    return this.withLock(() => {
      const candidate = this.records.get(id);
      this.logger.debug(
        candidate
          ? `Candidate retrieved: ID=${id}`
          : `Candidate not found: ID=${id}`,
      );
      return candidate ? copy(candidate) : undefined;
    });
  }

  /**
   * All records accepted by the predicate, in insertion order
   */
  async list(predicate?: CandidatePredicate): Promise<Candidate[]> {
    return this.withLock(() => {
      const all = Array.from(this.records.values());
      const matches = predicate ? all.filter(predicate) : all;
      this.logger.debug(
        `Listed candidates: ${matches.length} of ${all.length}`,
      );
      return matches.map(copy);
    });
  }

  async delete(id: number): Promise<Candidate | undefined> {
    return this.withLock(() => {
      const candidate = this.records.get(id);
      if (!candidate) {
        this.logger.warn(`Candidate not found for deletion: ID=${id}`);
        return undefined;
      }

      this.records.delete(id);
      this.logger.log(
        `Candidate deleted: ID=${id}, Name=${candidate.fullName}`,
      );
      return candidate;
    });
  }

  async exists(id: number): Promise<boolean> {
    return this.withLock(() => this.records.has(id));
  }

  async count(): Promise<number> {
    return this.withLock(() => this.records.size);
  }

  /**
   * Drop every record and restart id allocation at 1
   */
  async clear(): Promise<void> {
    return this.withLock(() => {
      this.records.clear();
      this.nextId = 1;
      this.logger.warn('Candidate store cleared');
    });
  }

  private async withLock<T>(fn: () => T): Promise<T> {
    let release: () => void = () => undefined;
    const next = new Promise<void>((resolve) => {
      release = resolve;
    });

    // Register as the new tail before waiting so later callers queue behind us
    const prev = this.tail;
    this.tail = next;
    await prev;

    try {
      return fn();
    } finally {
      release();
    }
  }
}

function copy(candidate: Candidate): Candidate {
  return {
    ...candidate,
    skillSet: [...candidate.skillSet],
    createdAt: new Date(candidate.createdAt.getTime()),
  };
}
