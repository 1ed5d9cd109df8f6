import { z } from 'zod';

export const candidateProfileSchema = z.object({
  /** Content hash of the resume text the profile was extracted from. */
  version: z.string().min(1),
  skills: z.array(z.string()),
  yearsExperience: z.number().min(0),
  education: z.array(z.string()),
  certifications: z.array(z.string()),
  priorTitles: z.array(z.string()),
  industries: z.array(z.string()),
  achievements: z.array(z.string()),
  /** Role types the work history points towards. */
  preferredRoles: z.array(z.string()),
  location: z.string().nullable(),
});

export type CandidateProfile = z.infer<typeof candidateProfileSchema>;
