import type {
  Application,
  ApplicationStatus,
  EmployerIdentity,
  Identity,
  JobPosting,
  JobSeekerIdentity,
  UserSummary,
} from "./types.js";
import type { JobCatalog } from "./job-catalog.js";
import type { ApplicationLedger } from "./application-ledger.js";

export type JobSummary = Pick<JobPosting, "id" | "title" | "company" | "location">;

export interface JobSeekerDashboard {
  user: UserSummary;
  num_applications: number;
  applications: Array<Application & { job: JobSummary | null }>;
  applied_jobs: JobPosting[];
}

export interface EmployerDashboard {
  user: UserSummary;
  num_jobs_posted: number;
  num_applications: number;
  jobs: Array<JobPosting & { application_count: number; status_counts: Record<ApplicationStatus, number> }>;
  applications: Application[];
}

export function toUserSummary(identity: Identity): UserSummary {
  const { id, email, name, role } = identity;
  return { id, email, name, role };
}

function emptyStatusCounts(): Record<ApplicationStatus, number> {
  return { submitted: 0, under_review: 0, accepted: 0, rejected: 0 };
}

export function jobseekerDashboard(
  seeker: JobSeekerIdentity,
  jobs: JobCatalog,
  ledger: ApplicationLedger,
): JobSeekerDashboard {
  const applications = ledger.listByApplicant(seeker.id);
  const appliedJobs: JobPosting[] = [];

  const joined = applications.map((application) => {
    const job = jobs.find(application.job_id);
    if (!job) return { ...application, job: null };
    appliedJobs.push(job);
    const { id, title, company, location } = job;
    return { ...application, job: { id, title, company, location } };
  });

  return {
    user: toUserSummary(seeker),
    num_applications: applications.length,
    applications: joined,
    applied_jobs: appliedJobs,
  };
}

export function employerDashboard(
  employer: EmployerIdentity,
  jobs: JobCatalog,
  ledger: ApplicationLedger,
): EmployerDashboard {
  const posted = jobs.listByEmployer(employer.id);
  const applications = ledger.listForJobs(posted.map((j) => j.id));

  const perJob = posted.map((job) => {
    const statusCounts = emptyStatusCounts();
    let count = 0;
    for (const application of applications) {
      if (application.job_id !== job.id) continue;
      count++;
      statusCounts[application.status]++;
    }
    return { ...job, application_count: count, status_counts: statusCounts };
  });

  return {
    user: toUserSummary(employer),
    num_jobs_posted: posted.length,
    num_applications: applications.length,
    jobs: perJob,
    applications,
  };
}
