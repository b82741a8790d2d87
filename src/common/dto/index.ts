export * from './candidate.dto';
export * from './error-response.dto';
