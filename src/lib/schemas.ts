import { z } from "zod";
import { APPLICATION_STATUSES, ROLES, type Role } from "./types.js";

const email = z.string().trim().email();
const password = z.string().min(6, "Password must be at least 6 characters");
const requiredText = z.string().trim().min(1);

export const roleSchema = z.enum(ROLES);

export const jobSeekerRegistrationSchema = z.object({
  email,
  password,
  name: requiredText,
  resume: z.string().nullish().transform((v) => v ?? null),
});

export const employerRegistrationSchema = z.object({
  email,
  password,
  name: requiredText,
  company_name: requiredText,
});

export const loginSchema = z.object({
  email,
  password: z.string().min(1),
  role: roleSchema.optional(),
});

function isRole(value: string): value is Role {
  return ROLES.some((role) => role === value);
}

// OAuth2 password grant: the first scope naming a role picks it; other scopes are ignored
export const tokenFormSchema = z.object({
  username: email,
  password: z.string().min(1),
  scope: z
    .string()
    .optional()
    .transform((s) => (s ?? "").split(/\s+/).find(isRole)),
});

const salary = z.number().int().nonnegative().nullable();

const jobFieldsSchema = z.object({
  title: requiredText,
  description: z.string(),
  company: requiredText.optional(),
  location: requiredText,
  skills: z.array(requiredText).default([]),
  salary_min: salary.optional(),
  salary_max: salary.optional(),
});

function salaryRangeOrdered(job: { salary_min?: number | null; salary_max?: number | null }): boolean {
  return job.salary_min == null || job.salary_max == null || job.salary_min <= job.salary_max;
}

const salaryRangeIssue = { message: "salary_min must not exceed salary_max", path: ["salary_min"] };

export const jobCreateSchema = jobFieldsSchema.refine(salaryRangeOrdered, salaryRangeIssue);

export const jobUpdateSchema = jobFieldsSchema
  .extend({ skills: z.array(requiredText).optional() })
  .partial()
  .refine(salaryRangeOrdered, salaryRangeIssue);

export const idParamSchema = z.coerce.number().int().positive();

export const applicationCreateSchema = z.object({
  job_id: z.number().int().positive(),
  cover_letter: z.string().nullish().transform((v) => v ?? null),
});

export const reviewSchema = z.object({
  status: z.enum(APPLICATION_STATUSES),
});

/** `?skills=go&skills=rust` and `?skills=go,rust` are equivalent. */
export function skillsFromQuery(values: string[]): string[] {
  return values
    .flatMap((v) => v.split(","))
    .map((s) => s.trim())
    .filter(Boolean);
}
