import type { Application, ApplicationStatus, JobSeekerIdentity } from "./types.js";
import type { JobCatalog } from "./job-catalog.js";
import { conflict, forbidden, notFound } from "./errors.js";

/**
 * Applications keyed by auto-incrementing id. Reads the job catalog for
 * existence and ownership but never writes to it.
 */
export class ApplicationLedger {
  private readonly applications = new Map<number, Application>();
  private lastId = 0;

  constructor(private readonly jobs: JobCatalog) {}

  apply(applicant: JobSeekerIdentity, jobId: number, coverLetter: string | null = null): Application {
    this.jobs.get(jobId);

    for (const existing of this.applications.values()) {
      if (existing.job_id === jobId && existing.applicant_id === applicant.id) {
        throw conflict("Already applied to this job");
      }
    }

    const now = new Date().toISOString();
    const application: Application = {
      id: ++this.lastId,
      job_id: jobId,
      applicant_id: applicant.id,
      seeker_email: applicant.email,
      cover_letter: coverLetter,
      status: "submitted",
      applied_at: now,
      updated_at: now,
    };
    this.applications.set(application.id, application);
    return { ...application };
  }

  listByApplicant(applicantId: string): Application[] {
    return this.where((a) => a.applicant_id === applicantId);
  }

  listByJob(jobId: number, employerId: string): Application[] {
    const job = this.jobs.get(jobId);
    if (job.employer_id !== employerId) {
      throw forbidden("Only the employer who posted the job can review applications");
    }
    return this.where((a) => a.job_id === jobId);
  }

  listForJobs(jobIds: Iterable<number>): Application[] {
    const ids = new Set(jobIds);
    return this.where((a) => ids.has(a.job_id));
  }

  // Any status may follow any other
  review(appId: number, employerId: string, status: ApplicationStatus): Application {
    const application = this.applications.get(appId);
    if (!application) throw notFound("Application");

    const job = this.jobs.find(application.job_id);
    if (!job || job.employer_id !== employerId) {
      throw forbidden("Can only review applications for your jobs");
    }

    const updated: Application = { ...application, status, updated_at: new Date().toISOString() };
    this.applications.set(appId, updated);
    return { ...updated };
  }

  private where(predicate: (a: Application) => boolean): Application[] {
    const results: Application[] = [];
    for (const application of this.applications.values()) {
      if (predicate(application)) results.push({ ...application });
    }
    return results;
  }
}
