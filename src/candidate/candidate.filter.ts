import { Candidate } from '../database/entities';

export interface CandidateFilter {
  skill?: string;
  minExperience?: number;
  maxExperience?: number;
  graduationYear?: number;
}

/**
 * Split a comma-separated skill list, trimming entries and dropping blanks
 * and case-insensitive repeats. The first spelling of a skill wins.
 */
export function parseSkillSet(input: string): string[] {
  const seen = new Set<string>();
  const skills: string[] = [];

  for (const token of input.split(',')) {
    const skill = token.trim();
    const key = skill.toLowerCase();
    if (skill && !seen.has(key)) {
      seen.add(key);
      skills.push(skill);
    }
  }

  return skills;
}

export function hasActiveFilter(filter: CandidateFilter): boolean {
  return (
    Boolean(filter.skill) ||
    filter.minExperience !== undefined ||
    filter.maxExperience !== undefined ||
    filter.graduationYear !== undefined
  );
}

/**
 * All given criteria must hold; a missing criterion places no constraint.
 * Skills match case-insensitively on any part of a listed skill.
 */
export function matchesCandidateFilter(
  candidate: Candidate,
  filter: CandidateFilter,
): boolean {
  if (filter.skill) {
    const needle = filter.skill.toLowerCase();
    if (!candidate.skillSet.some((skill) => skill.toLowerCase().includes(needle))) {
      return false;
    }
  }

  if (
    filter.minExperience !== undefined &&
    candidate.yearsOfExperience < filter.minExperience
  ) {
    return false;
  }

  if (
    filter.maxExperience !== undefined &&
    candidate.yearsOfExperience > filter.maxExperience
  ) {
    return false;
  }

  if (
    filter.graduationYear !== undefined &&
    candidate.graduationYear !== filter.graduationYear
  ) {
    return false;
  }

  return true;
}
