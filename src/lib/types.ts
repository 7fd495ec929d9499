/* ── Job Portal Entities ── */

export const ROLES = ["jobseeker", "employer"] as const;
export type Role = (typeof ROLES)[number];

export const APPLICATION_STATUSES = ["submitted", "under_review", "accepted", "rejected"] as const;
export type ApplicationStatus = (typeof APPLICATION_STATUSES)[number];

interface IdentityBase {
  id: string;
  email: string;
  name: string;
  created_at: string;   // ISO timestamp
}

export interface JobSeekerIdentity extends IdentityBase {
  role: "jobseeker";
  resume: string | null; // resume text or link
}

export interface EmployerIdentity extends IdentityBase {
  role: "employer";
  company_name: string;
}

export type Identity = JobSeekerIdentity | EmployerIdentity;

// Role plus the role-specific profile fields supplied at registration
export type RegistrationProfile =
  | Pick<JobSeekerIdentity, "role" | "name" | "resume">
  | Pick<EmployerIdentity, "role" | "name" | "company_name">;

// Returned by registration and embedded in dashboards
export interface UserSummary {
  id: string;
  email: string;
  name: string;
  role: Role;
}

export interface JobPosting {
  id: number;
  employer_id: string;  // identity id of the owning employer
  posted_by: string;    // employer email
  title: string;
  description: string;
  company: string;
  location: string;
  skills: string[];
  salary_min: number | null;
  salary_max: number | null;
  created_at: string;
  updated_at: string;
}

export interface JobFields {
  title: string;
  description: string;
  company?: string;
  location: string;
  skills: string[];
  salary_min?: number | null;
  salary_max?: number | null;
}

export type JobUpdate = Partial<JobFields>;

export interface JobFilter {
  query?: string;
  location?: string;
  skills?: string[];
}

export interface Application {
  id: number;
  job_id: number;
  applicant_id: string;
  seeker_email: string;
  cover_letter: string | null;
  status: ApplicationStatus;
  applied_at: string;
  updated_at: string;
}

export interface TokenClaims {
  sub: string;
  email: string;
  role: Role;
  iat: number;
  exp: number;
}

export interface AccessToken {
  access_token: string;
  token_type: "bearer";
  expires_in: number;   // seconds
}
