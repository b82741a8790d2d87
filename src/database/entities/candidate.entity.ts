/**
 * A submitted resume and the metadata that came with it.
 * `id`, `resumeFilename` and `createdAt` never change once the store has
 * accepted the record.
 */
export interface Candidate {
  id: number;
  fullName: string;
  // Calendar date, YYYY-MM-DD
  dob: string;
  contactNumber: string;
  contactAddress: string;
  educationQualification: string;
  graduationYear: number;
  yearsOfExperience: number; // Can be decimal (e.g., 3.5 years)
  skillSet: string[];
  resumeFilename: string;
  createdAt: Date;
}

// What the service hands to the store; the store assigns the rest
export type NewCandidate = Omit<Candidate, 'id' | 'createdAt'>;
