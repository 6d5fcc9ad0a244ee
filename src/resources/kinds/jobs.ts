import type { V1CronJob, V1Job } from "@kubernetes/client-node";
import { defineResource } from "../kube-resource";
import { getKubeResourceSchema } from "../schema";
import { getAge } from "../format";
import type { ResourceHandler } from "../types";

export type JobSummary = {
  name: string;
  namespace?: string;
  status: string;
  completions: string;
  age: string;
};

function jobStatus(job: V1Job): string {
  const finished = job.status?.conditions?.find((c) => (c.type === "Complete" || c.type === "Failed") && c.status === "True");
  if (finished) return finished.type;
  if (job.spec?.suspend) return "Suspended";
  if ((job.status?.active ?? 0) > 0) return "Running";
  return "Pending";
}

export function summarizeJob(job: V1Job, now: Date): JobSummary {
  return {
    name: job.metadata?.name ?? "N/A",
    namespace: job.metadata?.namespace,
    status: jobStatus(job),
    completions: `${job.status?.succeeded ?? 0}/${job.spec?.completions ?? 1}`,
    age: getAge(job.metadata?.creationTimestamp, now),
  };
}

export type CronJobSummary = {
  name: string;
  namespace?: string;
  schedule?: string;
  suspend: boolean;
  active: number;
  lastSchedule: string;
  age: string;
};

export function summarizeCronJob(cronJob: V1CronJob, now: Date): CronJobSummary {
  return {
    name: cronJob.metadata?.name ?? "N/A",
    namespace: cronJob.metadata?.namespace,
    schedule: cronJob.spec?.schedule,
    suspend: cronJob.spec?.suspend ?? false,
    active: cronJob.status?.active?.length ?? 0,
    lastSchedule: getAge(cronJob.status?.lastScheduleTime, now),
    age: getAge(cronJob.metadata?.creationTimestamp, now),
  };
}

export const jobHandler: ResourceHandler = defineResource({
  schema: getKubeResourceSchema("jobs"),
  verbs: ["list", "get"],
  summarize: summarizeJob,
});

export const cronJobHandler: ResourceHandler = defineResource({
  schema: getKubeResourceSchema("cronjobs"),
  verbs: ["list", "get"],
  summarize: summarizeCronJob,
});
