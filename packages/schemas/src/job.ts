import { z } from 'zod';
import { workTypeEnum, remoteOptionEnum, datePostedEnum } from './enums';
import { matchResultSchema } from './match';

export const searchCriteriaSchema = z.object({
  title: z.string().trim().min(1, 'Job title is required'),
  location: z.string().trim().min(1, 'Location is required'),
  workType: workTypeEnum.optional(),
  remoteOption: remoteOptionEnum.optional(),
  minSalary: z.number().int().positive().optional(),
  datePosted: datePostedEnum.optional(),
  maxJobs: z.number().int().min(1, 'maxJobs must be at least 1').optional(),
});

export type SearchCriteria = z.infer<typeof searchCriteriaSchema>;
export type SearchCriteriaInput = z.input<typeof searchCriteriaSchema>;

export const jobRecordSchema = z.object({
  id: z.string().min(1),
  title: z.string().min(1),
  company: z.string(),
  location: z.string(),
  salary: z.string().nullable(),
  workType: z.string().nullable(),
  postedAt: z.string().nullable(),
  shortDescription: z.string().nullable(),
  fullDescription: z.string().nullable(),
  sourceUrl: z.string().url(),
  match: matchResultSchema.optional(),
});

export type JobRecord = z.infer<typeof jobRecordSchema>;
