import { randomUUID } from "node:crypto";
import { emptyResult, type Job, type JobResult, type JobStatus } from "../job.js";
import type { CrawlOptions, LinkReport } from "../lib/types.js";

export interface NewJob {
  url: string;
  options: Required<CrawlOptions>;
}

export interface JobUpdateData {
  status?: JobStatus;
  summary?: JobResult["summary"];
  error?: string;
  completedAt?: Date;
}

// Jobs only live as long as the process.
const jobs = new Map<string, Job>();

export async function createJob(data: NewJob): Promise<Job> {
  const job: Job = {
    id: randomUUID(),
    url: data.url,
    options: data.options,
    status: "pending",
    result: emptyResult(),
    createdAt: new Date(),
  };

  jobs.set(job.id, job);
  return job;
}

export async function findJobById(id: string): Promise<Job | undefined> {
  return jobs.get(id);
}

export async function findAllJobs(): Promise<Job[]> {
  return Array.from(jobs.values()).sort(
    (a, b) => b.createdAt.getTime() - a.createdAt.getTime()
  );
}

export async function updateJob(
  id: string,
  data: JobUpdateData
): Promise<Job | undefined> {
  const job = jobs.get(id);
  if (!job) return undefined;

  const { summary, ...rest } = data;
  Object.assign(job, rest);
  if (summary) job.result.summary = summary;

  return job;
}

export async function appendReport(
  id: string,
  report: LinkReport
): Promise<Job | undefined> {
  const job = jobs.get(id);
  if (!job) return undefined;

  job.result.reports.push(report);
  return job;
}
