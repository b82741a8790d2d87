import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

export class ErrorResponseDto {
  @ApiProperty({ description: 'Error kind', example: 'CandidateNotFound' })
  error!: string;

  @ApiProperty({ example: 'Candidate with ID 999 not found' })
  message!: string;

  @ApiPropertyOptional({ description: 'Additional information about the failure' })
  detail?: unknown;

  @ApiProperty({ description: 'ISO 8601 timestamp', example: '2026-02-15T20:46:55.000Z' })
  timestamp!: string;
}
