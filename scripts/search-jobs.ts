/**
 * Search job listings and, given a resume, score and rank them.
 *
 * Run (from repo root):
 *   npm run search -- --title "Project Manager" --location Sydney --max 5
 *   npm run search -- --title "Data Analyst" --location Melbourne --resume ./resume.txt --details 3
 *
 * --http skips Chromium and fetches raw HTML instead.
 */

import './load-env';
import * as fs from 'fs';
import { parseArgs } from 'util';
import { HttpTransport, runJobMatch } from '@roleradar/agents';
import { PipelineError, loadConfig } from '@roleradar/core';
import { OllamaClient, OllamaCompletionService, OllamaModels } from '@roleradar/llm';
import {
  datePostedEnum,
  remoteOptionEnum,
  workTypeEnum,
  type SearchCriteriaInput,
} from '@roleradar/schemas';

const { values } = parseArgs({
  options: {
    title: { type: 'string' },
    location: { type: 'string', default: 'Sydney' },
    max: { type: 'string' },
    'work-type': { type: 'string' },
    remote: { type: 'string' },
    'min-salary': { type: 'string' },
    'date-posted': { type: 'string' },
    resume: { type: 'string' },
    details: { type: 'string', default: '0' },
    http: { type: 'boolean', default: false },
  },
});

function optionalInt(raw: string | undefined, flag: string): number | undefined {
  if (raw === undefined) return undefined;
  const n = Number.parseInt(raw, 10);
  if (Number.isNaN(n)) {
    console.error(`--${flag} must be a number, got "${raw}"`);
    process.exit(1);
  }
  return n;
}

async function main() {
  if (!values.title) {
    console.error('Usage: search-jobs --title <job title> [--location <city>] [--max N] [--resume file.txt]');
    process.exit(1);
  }

  const criteria: SearchCriteriaInput = {
    title: values.title,
    location: values.location ?? 'Sydney',
    maxJobs: optionalInt(values.max, 'max'),
    workType: values['work-type'] ? workTypeEnum.parse(values['work-type']) : undefined,
    remoteOption: values.remote ? remoteOptionEnum.parse(values.remote) : undefined,
    minSalary: optionalInt(values['min-salary'], 'min-salary'),
    datePosted: values['date-posted'] ? datePostedEnum.parse(values['date-posted']) : undefined,
  };
  let resumeText = values.resume ? fs.readFileSync(values.resume, 'utf-8') : undefined;

  const client = new OllamaClient();
  if (resumeText && !(await client.isAvailable(OllamaModels.REASONING))) {
    console.warn(
      `[WARN] Ollama or model "${OllamaModels.REASONING}" is not available; listings will be unscored.`,
    );
    resumeText = undefined;
  }

  const controller = new AbortController();
  process.once('SIGINT', () => {
    console.log('\nCancelling search...');
    controller.abort();
  });

  const config = loadConfig();
  console.log(`Searching "${criteria.title}" in ${criteria.location}...`);

  const result = await runJobMatch({
    criteria,
    resumeText,
    config,
    completion: new OllamaCompletionService({ client, modelType: 'REASONING' }),
    detailLimit: optionalInt(values.details, 'details'),
    transport: values.http ? new HttpTransport() : undefined,
    signal: controller.signal,
  });

  if (result.profile) {
    console.log(
      `Profile ${result.profile.version}: ${result.profile.skills.length} skills, ${result.profile.yearsExperience} years`,
    );
  }
  for (const [index, job] of result.jobs.entries()) {
    const score = job.match ? `${job.match.overallScore} ${job.match.recommendation}` : 'unscored';
    console.log(`\n${index + 1}. ${job.title} - ${job.company} (${job.location}) [${score}]`);
    if (job.salary) console.log(`   ${job.salary}`);
    console.log(`   ${job.sourceUrl}`);
    if (job.match?.reasoning) console.log(`   ${job.match.reasoning}`);
  }
  for (const issue of result.issues) {
    console.log(`[WARN] ${issue.stage}${issue.jobId ? ` (${issue.jobId})` : ''}: ${issue.message}`);
  }
  if (result.jobs.length === 0) console.log('No jobs found.');
}

main().catch((err: unknown) => {
  console.error(err instanceof PipelineError ? err.userMessage : err);
  process.exit(1);
});
