import { normalizeOptions } from "../lib/options.js";
import { renderSitemap } from "../lib/sitemap.js";
import type { HttpClient } from "../lib/http.js";
import * as jobRepository from "../repositories/job.repository.js";
import { processJob, type Job } from "../job.js";
import type { CreateJobDto, JobResponseDto, JobCreatedDto } from "../dto/job.dto.js";
import { toJobResponseDto, toJobCreatedDto } from "../dto/job.dto.js";

interface RunningJob {
  controller: AbortController;
  done: Promise<void>;
}

const running = new Map<string, RunningJob>();

export function isCrawlableUrl(url: string): boolean {
  try {
    const parsed = new URL(url);
    return parsed.protocol === "http:" || parsed.protocol === "https:";
  } catch {
    return false;
  }
}

export async function createJob(
  dto: CreateJobDto,
  client?: HttpClient
): Promise<JobCreatedDto> {
  const options = normalizeOptions(dto.options);

  const job = await jobRepository.createJob({
    url: dto.url,
    options,
  });

  console.log(`Job ${job.id} created for ${dto.url}`);
  const created = toJobCreatedDto(job);

  // Start processing in background (fire-and-forget)
  startProcessing(job, client);

  return created;
}

export async function getJob(id: string): Promise<JobResponseDto | undefined> {
  const job = await jobRepository.findJobById(id);
  if (!job) return undefined;
  return toJobResponseDto(job);
}

export async function getJobs(): Promise<JobResponseDto[]> {
  const jobs = await jobRepository.findAllJobs();
  return jobs.map(toJobResponseDto);
}

export async function getJobSitemap(id: string): Promise<string | undefined> {
  const job = await jobRepository.findJobById(id);
  if (!job) return undefined;
  return renderSitemap(job.result.reports);
}

/** Returns false when the job does not exist. */
export async function cancelJob(id: string): Promise<boolean> {
  const job = await jobRepository.findJobById(id);
  if (!job) return false;

  const entry = running.get(id);
  if (entry) {
    console.log(`Job ${id}: Cancelling`);
    entry.controller.abort();
  }
  return true;
}

/** Resolves once the job's crawl has finished, however it ended. */
export async function waitForJob(id: string): Promise<void> {
  await running.get(id)?.done;
}

export async function shutdown(): Promise<void> {
  const entries = Array.from(running.values());
  for (const entry of entries) entry.controller.abort();
  await Promise.all(entries.map((entry) => entry.done));
}

function startProcessing(job: Job, client?: HttpClient): void {
  const controller = new AbortController();

  const done = processJob(
    {
      id: job.id,
      url: job.url,
      options: job.options,
    },
    {
      onProcessing: async () => {
        await jobRepository.updateJob(job.id, { status: "processing" });
      },
      onReport: async (report) => {
        await jobRepository.appendReport(job.id, report);
      },
      onCompleted: async (summary) => {
        await jobRepository.updateJob(job.id, {
          status: "completed",
          summary,
          completedAt: new Date(),
        });
      },
      onCancelled: async (summary) => {
        await jobRepository.updateJob(job.id, {
          status: "cancelled",
          summary,
          completedAt: new Date(),
        });
      },
      onFailed: async (error: string) => {
        await jobRepository.updateJob(job.id, {
          status: "failed",
          error,
          completedAt: new Date(),
        });
      },
    },
    controller.signal,
    client
  ).finally(() => {
    running.delete(job.id);
  });

  running.set(job.id, { controller, done });
}
