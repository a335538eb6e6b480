/**
 * CV Profile Extractor
 *
 * One structured Claude call that turns raw CV text into a CvProfile:
 * skills with proficiency, seniority, years of experience, industries,
 * education and recent job titles.
 */

import { z } from 'zod';
import {
  parseJsonContent,
  type ClaudeModel,
  type ResponseSchema,
  type StructuredClient,
  type StructuredResponse,
} from '../../integrations/llm/ClaudeClient.js';
import {
  PROFICIENCY_LEVELS,
  SENIORITY_LEVELS,
  type CvProfile,
} from '../entities/CvProfile.js';
import { AIRequestError, AIResponseSchemaError } from '../errors/PipelineErrors.js';

// =============================================================================
// TYPES
// =============================================================================

export interface CvProfileExtractorConfig {
  model?: ClaudeModel;
  maxTokens: number;
  temperature: number;
}

const DEFAULT_CONFIG: CvProfileExtractorConfig = {
  maxTokens: 2048,
  temperature: 0,
};

const MAX_JOB_TITLES = 5;

// =============================================================================
// PROMPTS
// =============================================================================

const CV_PROFILE_SYSTEM_PROMPT = `You are a senior technical recruiter. Read the candidate's CV and build a structured profile of it.

1. Skills: every technical and professional skill the CV names or clearly implies. Rate each one beginner, intermediate, advanced or expert from how long it was used, how deep the described work goes and the context it was used in.
2. Seniority: junior, mid, senior, lead or principal, judged from the most recent roles, their scope and the total experience.
3. Total years of professional experience, from the earliest role to the latest.
4. Industries the candidate has worked in, such as fintech, healthcare or e-commerce.
5. Education: the highest degree level and its field.
6. Job titles: the ${MAX_JOB_TITLES} most recent at most, newest first.

Record the profile with the record_cv_profile tool.`;

export const CV_PROFILE_SCHEMA: ResponseSchema = {
  name: 'record_cv_profile',
  description: 'Record the structured profile extracted from the CV',
  inputSchema: {
    type: 'object',
    properties: {
      skills: {
        type: 'array',
        items: {
          type: 'object',
          properties: {
            name: { type: 'string' },
            proficiency: { type: 'string', enum: [...PROFICIENCY_LEVELS] },
          },
          required: ['name', 'proficiency'],
        },
      },
      seniority_level: { type: 'string', enum: [...SENIORITY_LEVELS] },
      total_years_experience: { type: 'integer' },
      industries: { type: 'array', items: { type: 'string' } },
      education: {
        type: 'object',
        properties: {
          degree_level: { type: 'string' },
          field: { type: 'string' },
        },
        required: ['degree_level', 'field'],
      },
      job_titles: { type: 'array', items: { type: 'string' } },
    },
    required: [
      'skills',
      'seniority_level',
      'total_years_experience',
      'industries',
      'education',
      'job_titles',
    ],
  },
};

const cvProfileResponseSchema = z.object({
  skills: z.array(
    z.object({
      name: z.string(),
      proficiency: z.enum(PROFICIENCY_LEVELS),
    })
  ),
  seniority_level: z.enum(SENIORITY_LEVELS),
  total_years_experience: z.number().int().nonnegative(),
  industries: z.array(z.string()),
  education: z.object({
    degree_level: z.string(),
    field: z.string(),
  }),
  job_titles: z.array(z.string()),
});

const REQUIRED_FIELDS = Object.keys(cvProfileResponseSchema.shape);

export function buildProfilePrompt(cvText: string): string {
  return 'CV:\n' + cvText;
}

/**
 * Validate a structured answer and map it to a CvProfile.
 * Missing top-level fields are named in the error message.
 */
export function validateCvProfile(raw: unknown): CvProfile {
  if (typeof raw === 'object' && raw !== null && !Array.isArray(raw)) {
    const present = new Set(Object.keys(raw));
    const missing = REQUIRED_FIELDS.filter((field) => !present.has(field));
    if (missing.length > 0) {
      throw new AIResponseSchemaError(`Profile is missing required fields: ${missing.join(', ')}`, {
        missing,
      });
    }
  }

  const parsed = cvProfileResponseSchema.safeParse(raw);
  if (!parsed.success) {
    throw new AIResponseSchemaError('Response does not match the profile schema', {
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    });
  }

  const profile = parsed.data;
  return {
    skills: profile.skills,
    seniorityLevel: profile.seniority_level,
    totalYearsExperience: profile.total_years_experience,
    industries: profile.industries,
    education: {
      degreeLevel: profile.education.degree_level,
      field: profile.education.field,
    },
    jobTitles: profile.job_titles.slice(0, MAX_JOB_TITLES),
  };
}

// =============================================================================
// CV PROFILE EXTRACTOR CLASS
// =============================================================================

export class CvProfileExtractor {
  private config: CvProfileExtractorConfig;

  constructor(
    private claudeClient: StructuredClient,
    config: Partial<CvProfileExtractorConfig> = {}
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Throws AIRequestError when the call fails and AIResponseSchemaError
   * when the answer is not a complete profile.
   */
  async extract(cvText: string): Promise<CvProfile> {
    let response: StructuredResponse;
    try {
      response = await this.claudeClient.structured({
        systemPrompt: CV_PROFILE_SYSTEM_PROMPT,
        prompt: buildProfilePrompt(cvText),
        schema: CV_PROFILE_SCHEMA,
        model: this.config.model,
        maxTokens: this.config.maxTokens,
        temperature: this.config.temperature,
      });
    } catch (error) {
      throw new AIRequestError(error instanceof Error ? error.message : 'Unknown error', {
        errorName: error instanceof Error ? error.name : typeof error,
      });
    }

    const profile = validateCvProfile(response.output ?? this.parseTextAnswer(response));
    console.log(
      `[CvProfileExtractor] Extracted ${profile.skills.length} skills, ` +
        `${profile.seniorityLevel}, ${profile.totalYearsExperience} years (${response.usage.totalTokens} tokens)`
    );
    return profile;
  }

  private parseTextAnswer(response: StructuredResponse): unknown {
    try {
      return parseJsonContent(response.content);
    } catch (error) {
      throw new AIResponseSchemaError('Response is not valid JSON', {
        cause: error instanceof Error ? error.message : String(error),
        stopReason: response.stopReason,
      });
    }
  }
}
