import { INestApplication } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import request from 'supertest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { AppModule } from '../app.module';
import { configureApp } from '../app.setup';
import { UPLOAD_CONFIG, UploadConfig } from '../config/configuration';

const MB = 1024 * 1024;

interface Fields {
  full_name: string;
  dob: string;
  contact_number: string;
  contact_address: string;
  education_qualification: string;
  graduation_year: string;
  years_of_experience: string;
  skill_set: string;
}

const fields = (overrides: Partial<Fields> = {}): Fields => ({
  full_name: 'John Doe',
  dob: '1995-06-15',
  contact_number: '98765-43210',
  contact_address: '123 Main Street, City, State, PIN-123456',
  education_qualification: 'B.Tech in Computer Science',
  graduation_year: '2020',
  years_of_experience: '3.5',
  skill_set: 'Python, FastAPI,  Docker ',
  ...overrides,
});

describe('Resume collector API (e2e)', () => {
  let app: INestApplication;
  let uploadDir: string;

  const upload = (
    body: Fields = fields(),
    file: { content: Buffer; name: string } | null = { content: Buffer.from('%PDF-1.4 resume'), name: 'cv.pdf' },
  ) => {
    const req = request(app.getHttpServer()).post('/candidates');
    for (const [key, value] of Object.entries(body)) {
      req.field(key, value);
    }
    return file ? req.attach('resume', file.content, file.name) : req;
  };

  beforeEach(async () => {
    uploadDir = fs.mkdtempSync(path.join(os.tmpdir(), 'resume-e2e-'));
    const uploadConfig: UploadConfig = {
      uploadDir,
      maxFileSize: 10 * MB,
      allowedExtensions: ['.pdf', '.doc', '.docx'],
    };

    const moduleRef = await Test.createTestingModule({ imports: [AppModule] })
      .overrideProvider(UPLOAD_CONFIG)
      .useValue(uploadConfig)
      .compile();

    app = moduleRef.createNestApplication({ logger: false });
    configureApp(app);
    await app.init();
  });

  afterEach(async () => {
    await app.close();
    fs.rmSync(uploadDir, { recursive: true, force: true });
  });

  describe('GET /health', () => {
    it('should report the service as healthy', async () => {
      const res = await request(app.getHttpServer()).get('/health').expect(200);

      expect(res.body).toMatchObject({
        status: 'healthy',
        version: '1.0.0',
        message: 'Service is running',
      });
      expect(Number.isNaN(Date.parse(res.body.timestamp))).toBe(false);
    });
  });

  describe('POST /candidates', () => {
    it('should create a candidate', async () => {
      const res = await upload().expect(201);

      expect(res.body).toMatchObject({
        id: 1,
        full_name: 'John Doe',
        dob: '1995-06-15',
        contact_number: '9876543210',
        contact_address: '123 Main Street, City, State, PIN-123456',
        education_qualification: 'B.Tech in Computer Science',
        graduation_year: 2020,
        years_of_experience: 3.5,
        skill_set: ['Python', 'FastAPI', 'Docker'],
      });
      expect(res.body.resume_filename).toMatch(/^[0-9a-f]{32}\.pdf$/);
      expect(fs.readdirSync(uploadDir)).toEqual([res.body.resume_filename]);
    });

    it('should reject an unsupported file type with 400', async () => {
      const res = await upload(fields(), { content: Buffer.from('plain text'), name: 'resume.txt' }).expect(400);

      expect(res.body).toMatchObject({
        error: 'InvalidFileType',
        message: "Invalid file type for 'resume.txt'",
        detail: 'Allowed types: .pdf, .doc, .docx',
      });
      expect(typeof res.body.timestamp).toBe('string');
      expect(fs.readdirSync(uploadDir)).toEqual([]);
    });

    it('should stop reading a file well over 10 MB and answer 413', async () => {
      const res = await upload(fields(), { content: Buffer.alloc(11 * MB), name: 'big.pdf' }).expect(413);

      expect(res.body).toEqual({
        error: 'FileTooLarge',
        message: 'Uploaded file size exceeds the maximum limit',
        timestamp: expect.any(String),
      });
      expect(fs.readdirSync(uploadDir)).toEqual([]);
    });

    it('should reject a file one byte over 10 MB with the detailed 413', async () => {
      const res = await upload(fields(), { content: Buffer.alloc(10 * MB + 1), name: 'big.pdf' }).expect(413);

      expect(res.body).toMatchObject({
        error: 'FileTooLarge',
        message: "File 'big.pdf' size exceeds the maximum limit",
        detail: 'File size: 10.00 MB, Max allowed: 10.00 MB',
      });
      expect(fs.readdirSync(uploadDir)).toEqual([]);
    });

    it('should accept a file of exactly 10 MB', async () => {
      await upload(fields(), { content: Buffer.alloc(10 * MB), name: 'cv.pdf' }).expect(201);
    });

    it('should reject a blank years_of_experience with 422', async () => {
      const res = await upload(fields({ years_of_experience: '' })).expect(422);

      expect(res.body.error).toBe('ValidationError');
      expect(res.body.detail).toContainEqual({
        field: 'years_of_experience',
        message: 'years_of_experience must be a number conforming to the specified constraints',
      });
      expect(fs.readdirSync(uploadDir)).toEqual([]);
    });

    it('should reject a whitespace-only graduation_year with 422', async () => {
      const res = await upload(fields({ graduation_year: '  ' })).expect(422);

      expect(res.body.detail).toContainEqual({
        field: 'graduation_year',
        message: 'graduation_year must be an integer number',
      });
    });

    it('should reject invalid fields with 422', async () => {
      const res = await upload(fields({ dob: '2999-01-01' })).expect(422);

      expect(res.body).toMatchObject({
        error: 'ValidationError',
        message: 'Request validation failed',
        detail: [
          { field: 'dob', message: 'dob must be a past date in YYYY-MM-DD format, after 1900' },
        ],
      });
    });

    it('should reject an out-of-range graduation year', async () => {
      const res = await upload(fields({ graduation_year: '1949' })).expect(422);

      expect(res.body.detail).toEqual([
        { field: 'graduation_year', message: 'graduation_year must not be less than 1950' },
      ]);
    });

    it('should require the resume file', async () => {
      const res = await upload(fields(), null).expect(422);

      expect(res.body).toMatchObject({
        error: 'ValidationError',
        message: 'Resume file is required',
      });
    });
  });

  describe('GET /candidates', () => {
    beforeEach(async () => {
      await upload(fields({ full_name: 'Alice Smith', graduation_year: '2020', years_of_experience: '3.5' })).expect(201);
      await upload(
        fields({ full_name: 'Bob Jones', graduation_year: '2021', years_of_experience: '1.0', skill_set: 'Java, Spring' }),
      ).expect(201);
    });

    const names = (body: { full_name: string }[]) => body.map((candidate) => candidate.full_name);

    it('should list every candidate in upload order', async () => {
      const res = await request(app.getHttpServer()).get('/candidates').expect(200);

      expect(names(res.body)).toEqual(['Alice Smith', 'Bob Jones']);
    });

    it('should filter by minimum experience', async () => {
      const res = await request(app.getHttpServer()).get('/candidates?min_experience=2').expect(200);

      expect(names(res.body)).toEqual(['Alice Smith']);
    });

    it('should filter by graduation year', async () => {
      const res = await request(app.getHttpServer()).get('/candidates?graduation_year=2021').expect(200);

      expect(names(res.body)).toEqual(['Bob Jones']);
    });

    it('should filter by skill regardless of case', async () => {
      const res = await request(app.getHttpServer()).get('/candidates?skill=python').expect(200);

      expect(names(res.body)).toEqual(['Alice Smith']);
    });

    it('should treat blank numeric filters as absent', async () => {
      const res = await request(app.getHttpServer())
        .get('/candidates?max_experience=&min_experience=%20&graduation_year=')
        .expect(200);

      expect(names(res.body)).toEqual(['Alice Smith', 'Bob Jones']);
    });

    it('should reject a malformed filter with 422', async () => {
      const res = await request(app.getHttpServer()).get('/candidates?min_experience=abc').expect(422);

      expect(res.body.error).toBe('ValidationError');
    });

    it('should reject an inverted experience range with 422', async () => {
      const res = await request(app.getHttpServer())
        .get('/candidates?min_experience=5&max_experience=1')
        .expect(422);

      expect(res.body.message).toBe('max_experience must be greater than or equal to min_experience');
    });
  });

  describe('GET /candidates/stats', () => {
    it('should count candidates', async () => {
      await upload().expect(201);

      const res = await request(app.getHttpServer()).get('/candidates/stats').expect(200);
      expect(res.body).toEqual({ total_candidates: 1 });
    });
  });

  describe('GET /candidates/:id', () => {
    it('should return a stored candidate', async () => {
      const created = await upload().expect(201);

      const res = await request(app.getHttpServer()).get('/candidates/1').expect(200);
      expect(res.body).toEqual(created.body);
    });

    it('should return 404 for an unknown id', async () => {
      const res = await request(app.getHttpServer()).get('/candidates/999').expect(404);

      expect(res.body).toEqual({
        error: 'CandidateNotFound',
        message: 'Candidate with ID 999 not found',
        timestamp: expect.any(String),
      });
    });

    it('should return 422 for a non-numeric id', async () => {
      const res = await request(app.getHttpServer()).get('/candidates/abc').expect(422);

      expect(res.body.error).toBe('ValidationError');
    });
  });

  describe('DELETE /candidates/:id', () => {
    it('should delete the candidate and the resume file', async () => {
      await upload().expect(201);

      const res = await request(app.getHttpServer()).delete('/candidates/1').expect(200);

      expect(res.body).toEqual({
        message: 'Candidate 1 deleted successfully',
        deleted_candidate: { id: 1, full_name: 'John Doe' },
      });
      expect(fs.readdirSync(uploadDir)).toEqual([]);
      await request(app.getHttpServer()).get('/candidates/1').expect(404);
    });

    it('should return 404 for an unknown id', async () => {
      const res = await request(app.getHttpServer()).delete('/candidates/999').expect(404);

      expect(res.body.error).toBe('CandidateNotFound');
    });
  });

  it('should answer unknown routes with the uniform error body', async () => {
    const res = await request(app.getHttpServer()).get('/nowhere').expect(404);

    expect(res.body).toEqual({
      error: 'NotFound',
      message: 'Cannot GET /nowhere',
      timestamp: expect.any(String),
    });
  });
});
