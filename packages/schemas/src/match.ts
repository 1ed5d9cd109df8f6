import { z } from 'zod';
import { recommendationTierEnum } from './enums';

export const matchResultSchema = z.object({
  jobId: z.string().min(1),
  profileVersion: z.string().min(1),
  overallScore: z.number().min(0).max(100),
  skillMatchPercentage: z.number().min(0).max(100),
  recommendation: recommendationTierEnum,
  reasoning: z.string(),
  pros: z.array(z.string()),
  cons: z.array(z.string()),
  gaps: z.array(z.string()),
  strongMatches: z.array(z.string()),
  strategicNotes: z.array(z.string()),
});

export type MatchResult = z.infer<typeof matchResultSchema>;
