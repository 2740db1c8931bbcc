import type { CrawlOptions, FailureReason, LinkReport } from "../lib/types.js";
import type { ReportSummary } from "../lib/sitemap.js";
import type { Job, JobStatus } from "../job.js";

export interface CreateJobDto {
  url: string;
  options?: CrawlOptions;
}

export interface StatusDto {
  isLive: boolean;
  isCrawlable: boolean;
  lastStatusCode: number;
  observedAt: string;
  failureReason?: FailureReason;
}

export interface LinkReportDto {
  path: string;
  status: StatusDto;
  children: LinkReportDto[];
}

export interface JobResponseDto {
  id: string;
  url: string;
  status: JobStatus;
  options: Required<CrawlOptions>;
  summary: ReportSummary;
  reports: LinkReportDto[];
  error?: string;
  createdAt: string;
  completedAt?: string;
}

export interface JobCreatedDto {
  id: string;
  status: JobStatus;
}

export function toLinkReportDto(report: LinkReport): LinkReportDto {
  const { status } = report;
  return {
    path: report.path,
    status: {
      isLive: status.isLive,
      isCrawlable: status.isCrawlable,
      lastStatusCode: status.lastStatusCode,
      observedAt: status.observedAt.toISOString(),
      failureReason: status.failureReason,
    },
    children: report.children.map(toLinkReportDto),
  };
}

export function toJobResponseDto(job: Job): JobResponseDto {
  return {
    id: job.id,
    url: job.url,
    status: job.status,
    options: job.options,
    summary: job.result.summary,
    reports: job.result.reports.map(toLinkReportDto),
    error: job.error,
    createdAt: job.createdAt.toISOString(),
    completedAt: job.completedAt?.toISOString(),
  };
}

export function toJobCreatedDto(job: Job): JobCreatedDto {
  return {
    id: job.id,
    status: job.status,
  };
}
