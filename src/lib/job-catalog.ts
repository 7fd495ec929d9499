import type { EmployerIdentity, JobFields, JobFilter, JobPosting, JobUpdate } from "./types.js";
import { PortalError, forbidden, notFound } from "./errors.js";

function lower(value: string): string {
  return value.toLowerCase();
}

function clone(job: JobPosting): JobPosting {
  return { ...job, skills: [...job.skills] };
}

export function matchesFilter(job: JobPosting, filter: JobFilter): boolean {
  if (filter.query) {
    const q = lower(filter.query);
    if (!lower(job.title).includes(q) && !lower(job.description).includes(q)) return false;
  }

  if (filter.location) {
    if (!lower(job.location).includes(lower(filter.location))) return false;
  }

  if (filter.skills && filter.skills.length > 0) {
    const have = new Set(job.skills.map(lower));
    if (!filter.skills.every((skill) => have.has(lower(skill)))) return false;
  }

  return true;
}

/**
 * Job postings keyed by auto-incrementing id. Map iteration order is
 * insertion order, which is the listing order.
 */
export class JobCatalog {
  private readonly jobs = new Map<number, JobPosting>();
  private lastId = 0;

  create(employer: EmployerIdentity, fields: JobFields): JobPosting {
    const now = new Date().toISOString();
    const job: JobPosting = {
      id: ++this.lastId,
      employer_id: employer.id,
      posted_by: employer.email,
      title: fields.title,
      description: fields.description,
      company: fields.company || employer.company_name,
      location: fields.location,
      skills: [...fields.skills],
      salary_min: fields.salary_min ?? null,
      salary_max: fields.salary_max ?? null,
      created_at: now,
      updated_at: now,
    };
    this.jobs.set(job.id, job);
    return clone(job);
  }

  list(filter: JobFilter = {}): JobPosting[] {
    const results: JobPosting[] = [];
    for (const job of this.jobs.values()) {
      if (matchesFilter(job, filter)) results.push(clone(job));
    }
    return results;
  }

  listByEmployer(employerId: string): JobPosting[] {
    return [...this.jobs.values()].filter((j) => j.employer_id === employerId).map(clone);
  }

  find(id: number): JobPosting | undefined {
    const job = this.jobs.get(id);
    return job ? clone(job) : undefined;
  }

  get(id: number): JobPosting {
    const job = this.find(id);
    if (!job) throw notFound("Job");
    return job;
  }

  update(id: number, employerId: string, fields: JobUpdate): JobPosting {
    const job = this.owned(id, employerId, "Cannot update job not posted by you");

    const updated: JobPosting = { ...clone(job), updated_at: new Date().toISOString() };
    if (fields.title !== undefined) updated.title = fields.title;
    if (fields.description !== undefined) updated.description = fields.description;
    if (fields.company !== undefined) updated.company = fields.company;
    if (fields.location !== undefined) updated.location = fields.location;
    if (fields.skills !== undefined) updated.skills = [...fields.skills];
    if (fields.salary_min !== undefined) updated.salary_min = fields.salary_min;
    if (fields.salary_max !== undefined) updated.salary_max = fields.salary_max;

    // The merged posting has to keep its range ordered, not just the patch
    if (updated.salary_min !== null && updated.salary_max !== null && updated.salary_min > updated.salary_max) {
      throw new PortalError("validation", "Request validation failed", [
        { field: "salary_min", message: "salary_min must not exceed salary_max" },
      ]);
    }

    this.jobs.set(id, updated);
    return clone(updated);
  }

  // Applications referencing the job are left in place
  delete(id: number, employerId: string): void {
    this.owned(id, employerId, "Cannot delete job not posted by you");
    this.jobs.delete(id);
  }

  private owned(id: number, employerId: string, message: string): JobPosting {
    const job = this.jobs.get(id);
    if (!job) throw notFound("Job");
    if (job.employer_id !== employerId) throw forbidden(message);
    return job;
  }
}
