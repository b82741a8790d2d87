import {
  Controller,
  Get,
  Post,
  Delete,
  Param,
  Body,
  Query,
  UseInterceptors,
  UploadedFile,
  HttpCode,
  HttpStatus,
  ParseIntPipe,
  Logger,
} from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import { ApiTags, ApiOperation, ApiResponse, ApiConsumes, ApiBody, ApiParam } from '@nestjs/swagger';
import { CandidateService } from './candidate.service';
import {
  CreateCandidateDto,
  CandidateQueryDto,
  CandidateResponseDto,
  CandidateStatisticsDto,
  DeleteCandidateResponseDto,
  ErrorResponseDto,
  toCandidateResponse,
} from '../common/dto';
import { CandidateError } from '../common/errors/candidate.error';

const parseId = new ParseIntPipe({
  exceptionFactory: (message: string) =>
    CandidateError.validation(message, [{ field: 'id', message }]),
});

@ApiTags('Candidates')
@Controller('candidates')
export class CandidateController {
  private readonly logger = new Logger(CandidateController.name);

  constructor(private readonly candidateService: CandidateService) {}

  /**
   * POST /candidates
   * Upload a resume (PDF/DOC/DOCX, max 10 MB) with the candidate's details
   */
  @Post()
  @HttpCode(HttpStatus.CREATED)
  @UseInterceptors(FileInterceptor('resume'))
  @ApiOperation({ summary: 'Upload candidate resume', description: 'Upload a resume file together with the candidate metadata' })
  @ApiConsumes('multipart/form-data')
  @ApiBody({
    schema: {
      type: 'object',
      required: [
        'full_name',
        'dob',
        'contact_number',
        'contact_address',
        'education_qualification',
        'graduation_year',
        'years_of_experience',
        'skill_set',
        'resume',
      ],
      properties: {
        full_name: { type: 'string', example: 'John Doe' },
        dob: { type: 'string', format: 'date', example: '1995-06-15' },
        contact_number: { type: 'string', example: '9876543210' },
        contact_address: { type: 'string', example: '123 Main Street, City, State, PIN-123456' },
        education_qualification: { type: 'string', example: 'B.Tech in Computer Science' },
        graduation_year: { type: 'integer', example: 2020 },
        years_of_experience: { type: 'number', example: 3.5 },
        skill_set: { type: 'string', example: 'Python, FastAPI, Docker' },
        resume: { type: 'string', format: 'binary', description: 'Resume file (PDF/DOC/DOCX)' },
      },
    },
  })
  @ApiResponse({ status: 201, description: 'Resume uploaded', type: CandidateResponseDto })
  @ApiResponse({ status: 400, description: 'Invalid file type', type: ErrorResponseDto })
  @ApiResponse({ status: 413, description: 'File exceeds the size limit', type: ErrorResponseDto })
  @ApiResponse({ status: 422, description: 'Invalid form fields', type: ErrorResponseDto })
  async upload(
    @Body() dto: CreateCandidateDto,
    @UploadedFile() file: Express.Multer.File | undefined,
  ): Promise<CandidateResponseDto> {
    if (!file) {
      throw CandidateError.validation('Resume file is required', [
        { field: 'resume', message: 'resume file is required' },
      ]);
    }

    this.logger.log(`Resume upload request: ${dto.full_name}`);

    const candidate = await this.candidateService.submit(
      {
        fullName: dto.full_name,
        dob: dto.dob,
        contactNumber: dto.contact_number,
        contactAddress: dto.contact_address,
        educationQualification: dto.education_qualification,
        graduationYear: dto.graduation_year,
        yearsOfExperience: dto.years_of_experience,
        skillSet: dto.skill_set,
      },
      file.buffer,
      file.originalname,
    );

    return toCandidateResponse(candidate);
  }

  /**
   * GET /candidates
   * List candidates, optionally filtered
   */
  @Get()
  @ApiOperation({ summary: 'List candidates', description: 'List candidates, optionally filtered by skill, experience range and graduation year' })
  @ApiResponse({ status: 200, description: 'Matching candidates', type: [CandidateResponseDto] })
  @ApiResponse({ status: 422, description: 'Invalid filter parameters', type: ErrorResponseDto })
  async findAll(@Query() query: CandidateQueryDto): Promise<CandidateResponseDto[]> {
    const candidates = await this.candidateService.query({
      skill: query.skill,
      minExperience: query.min_experience,
      maxExperience: query.max_experience,
      graduationYear: query.graduation_year,
    });

    this.logger.log(`Retrieved ${candidates.length} candidates`);
    return candidates.map(toCandidateResponse);
  }

  /**
   * GET /candidates/stats
   */
  @Get('stats')
  @ApiOperation({ summary: 'Get statistics', description: 'Number of stored candidates' })
  @ApiResponse({ status: 200, description: 'Candidate statistics', type: CandidateStatisticsDto })
  async getStats(): Promise<CandidateStatisticsDto> {
    return await this.candidateService.getStatistics();
  }

  /**
   * GET /candidates/:id
   */
  @Get(':id')
  @ApiOperation({ summary: 'Get candidate by ID' })
  @ApiParam({ name: 'id', description: 'Candidate ID', type: Number })
  @ApiResponse({ status: 200, description: 'Candidate details', type: CandidateResponseDto })
  @ApiResponse({ status: 404, description: 'Candidate not found', type: ErrorResponseDto })
  async findOne(@Param('id', parseId) id: number): Promise<CandidateResponseDto> {
    return toCandidateResponse(await this.candidateService.find(id));
  }

  /**
   * DELETE /candidates/:id
   * Delete a candidate and their resume file
   */
  @Delete(':id')
  @ApiOperation({ summary: 'Delete candidate', description: 'Delete a candidate and the stored resume file' })
  @ApiParam({ name: 'id', description: 'Candidate ID', type: Number })
  @ApiResponse({ status: 200, description: 'Candidate deleted', type: DeleteCandidateResponseDto })
  @ApiResponse({ status: 404, description: 'Candidate not found', type: ErrorResponseDto })
  async remove(@Param('id', parseId) id: number): Promise<DeleteCandidateResponseDto> {
    const candidate = await this.candidateService.remove(id);
    return {
      message: `Candidate ${id} deleted successfully`,
      deleted_candidate: {
        id: candidate.id,
        full_name: candidate.fullName,
      },
    };
  }
}
