import { Module } from '@nestjs/common';
import { CandidateStore } from './candidate.store';

// One store per application; records live as long as the process
@Module({
  providers: [CandidateStore],
  exports: [CandidateStore],
})
export class DatabaseModule {}
