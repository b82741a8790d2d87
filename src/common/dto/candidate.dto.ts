import {
  IsString,
  IsOptional,
  IsNumber,
  IsInt,
  IsNotEmpty,
  Length,
  Matches,
  Min,
  Max,
} from 'class-validator';
import { Transform } from 'class-transformer';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Candidate } from '../../database/entities';
import { IsPastDate } from '../validators/is-past-date.validator';

const trim = ({ value }: { value: unknown }) =>
  typeof value === 'string' ? value.trim() : value;

// Runs before implicit conversion, which would turn '' into 0
const blankToUndefined = ({ value }: { value: unknown }) => {
  if (typeof value !== 'string') {
    return value;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
};

/**
 * Form fields sent next to the resume file
 */
export class CreateCandidateDto {
  @ApiProperty({ description: "Candidate's full name", example: 'John Doe' })
  @Transform(trim)
  @IsString()
  @Length(2, 100)
  full_name!: string;

  @ApiProperty({ description: 'Date of birth (YYYY-MM-DD)', example: '1995-06-15' })
  @Transform(trim)
  @IsString()
  @IsPastDate()
  dob!: string;

  @ApiProperty({
    description: 'Contact number, 10-12 digits with an optional country code',
    example: '9876543210',
  })
  @Transform(({ value }) =>
    typeof value === 'string' ? value.replace(/[\s-]/g, '') : value,
  )
  @IsString()
  @Matches(/^(\+\d{1,3})?\d{10,12}$/, {
    message:
      'contact_number must be 10-12 digits, optionally with country code (e.g. +919876543210 or 9876543210)',
  })
  contact_number!: string;

  @ApiProperty({
    description: 'Full contact address',
    example: '123 Main Street, City, State, PIN-123456',
  })
  @Transform(trim)
  @IsString()
  @Length(10, 500)
  contact_address!: string;

  @ApiProperty({
    description: 'Highest education qualification',
    example: 'B.Tech in Computer Science',
  })
  @Transform(trim)
  @IsString()
  @Length(2, 100)
  education_qualification!: string;

  @ApiProperty({ description: 'Year of graduation', example: 2020 })
  @Transform(blankToUndefined)
  @IsInt()
  @Min(1950)
  @Max(2030)
  graduation_year!: number;

  @ApiProperty({ description: 'Years of professional experience', example: 3.5 })
  @Transform(blankToUndefined)
  @IsNumber()
  @Min(0)
  @Max(50)
  years_of_experience!: number;

  @ApiProperty({
    description: 'Comma-separated list of skills',
    example: 'Python, FastAPI, Docker',
  })
  @IsString()
  @IsNotEmpty()
  skill_set!: string;
}

export class CandidateQueryDto {
  @ApiPropertyOptional({ description: 'Skill to match (case-insensitive, partial)', example: 'Python' })
  @IsOptional()
  @Transform(blankToUndefined)
  @IsString()
  skill?: string;

  @ApiPropertyOptional({ description: 'Minimum years of experience', example: 2 })
  @IsOptional()
  @Transform(blankToUndefined)
  @IsNumber()
  @Min(0)
  min_experience?: number;

  @ApiPropertyOptional({ description: 'Maximum years of experience', example: 5 })
  @IsOptional()
  @Transform(blankToUndefined)
  @IsNumber()
  @Min(0)
  max_experience?: number;

  @ApiPropertyOptional({ description: 'Graduation year', example: 2020 })
  @IsOptional()
  @Transform(blankToUndefined)
  @IsInt()
  @Min(1950)
  @Max(2030)
  graduation_year?: number;
}

export class CandidateResponseDto {
  @ApiProperty({ description: 'Candidate ID', example: 1 })
  id!: number;

  @ApiProperty({ description: 'Full name' })
  full_name!: string;

  @ApiProperty({ description: 'Date of birth', example: '1995-06-15' })
  dob!: string;

  @ApiProperty({ description: 'Contact number' })
  contact_number!: string;

  @ApiProperty({ description: 'Contact address' })
  contact_address!: string;

  @ApiProperty({ description: 'Education qualification' })
  education_qualification!: string;

  @ApiProperty({ description: 'Graduation year' })
  graduation_year!: number;

  @ApiProperty({ description: 'Years of experience' })
  years_of_experience!: number;

  @ApiProperty({ description: 'Skills', type: [String] })
  skill_set!: string[];

  @ApiProperty({ description: 'Stored resume file name', example: '3f2a9c0e5b7d4e1f8a6b2c9d0e1f2a3b.pdf' })
  resume_filename!: string;

  @ApiProperty({ description: 'Upload timestamp (ISO 8601)' })
  created_at!: string;
}

export class DeletedCandidateDto {
  @ApiProperty()
  id!: number;

  @ApiProperty()
  full_name!: string;
}

export class DeleteCandidateResponseDto {
  @ApiProperty({ example: 'Candidate 1 deleted successfully' })
  message!: string;

  @ApiProperty({ type: DeletedCandidateDto })
  deleted_candidate!: DeletedCandidateDto;
}

export class CandidateStatisticsDto {
  @ApiProperty({ description: 'Number of stored candidates' })
  total_candidates!: number;
}

export function toCandidateResponse(candidate: Candidate): CandidateResponseDto {
  return {
    id: candidate.id,
    full_name: candidate.fullName,
    dob: candidate.dob,
    contact_number: candidate.contactNumber,
    contact_address: candidate.contactAddress,
    education_qualification: candidate.educationQualification,
    graduation_year: candidate.graduationYear,
    years_of_experience: candidate.yearsOfExperience,
    skill_set: [...candidate.skillSet],
    resume_filename: candidate.resumeFilename,
    created_at: candidate.createdAt.toISOString(),
  };
}
