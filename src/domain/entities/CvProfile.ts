/**
 * CV Profile - Structured summary of a candidate's CV
 */

export const PROFICIENCY_LEVELS = ['beginner', 'intermediate', 'advanced', 'expert'] as const;
export type Proficiency = (typeof PROFICIENCY_LEVELS)[number];

export const SENIORITY_LEVELS = ['junior', 'mid', 'senior', 'lead', 'principal'] as const;
export type SeniorityLevel = (typeof SENIORITY_LEVELS)[number];

export interface CvSkill {
  name: string;
  proficiency: Proficiency;
}

export interface CvProfile {
  skills: CvSkill[];
  seniorityLevel: SeniorityLevel;
  totalYearsExperience: number;
  industries: string[];
  education: {
    degreeLevel: string;
    field: string;
  };
  jobTitles: string[]; // newest first
}
