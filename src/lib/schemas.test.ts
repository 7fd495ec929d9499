import { describe, expect, it } from "vitest";
import {
  applicationCreateSchema,
  idParamSchema,
  jobCreateSchema,
  jobUpdateSchema,
  jobSeekerRegistrationSchema,
  skillsFromQuery,
  tokenFormSchema,
} from "./schemas.js";

describe("schemas", () => {
  it("requires a valid email and a six character password at registration", () => {
    expect(jobSeekerRegistrationSchema.safeParse({ email: "nope", password: "password1", name: "A" }).success).toBe(false);
    expect(jobSeekerRegistrationSchema.safeParse({ email: "a@b.test", password: "short", name: "A" }).success).toBe(false);
    expect(jobSeekerRegistrationSchema.parse({ email: " a@b.test ", password: "password1", name: "A" })).toEqual({
      email: "a@b.test",
      password: "password1",
      name: "A",
      resume: null,
    });
  });

  it("defaults skills and checks the salary range on create", () => {
    expect(jobCreateSchema.parse({ title: "T", description: "D", location: "L" }).skills).toEqual([]);
    expect(jobCreateSchema.safeParse({ title: "T", description: "D", location: "L", salary_min: 10, salary_max: 5 }).success).toBe(false);
  });

  it("accepts an empty update and leaves skills untouched", () => {
    expect(jobUpdateSchema.parse({})).toEqual({});
    expect(jobUpdateSchema.safeParse({ title: "" }).success).toBe(false);
  });

  it("coerces path ids and rejects non-numeric ones", () => {
    expect(idParamSchema.parse("12")).toBe(12);
    expect(idParamSchema.safeParse("abc").success).toBe(false);
    expect(idParamSchema.safeParse("0").success).toBe(false);
  });

  it("reads the role from the first OAuth scope that names one", () => {
    expect(tokenFormSchema.parse({ username: "a@b.test", password: "pw", scope: "employer extra" }).scope).toBe("employer");
    expect(tokenFormSchema.parse({ username: "a@b.test", password: "pw", scope: "openid jobseeker" }).scope).toBe("jobseeker");
    expect(tokenFormSchema.parse({ username: "a@b.test", password: "pw" }).scope).toBeUndefined();
    expect(tokenFormSchema.parse({ username: "a@b.test", password: "pw", scope: "admin" }).scope).toBeUndefined();
  });

  it("requires an integer job id when applying", () => {
    expect(applicationCreateSchema.parse({ job_id: 3 })).toEqual({ job_id: 3, cover_letter: null });
    expect(applicationCreateSchema.safeParse({ job_id: "3" }).success).toBe(false);
  });

  it("splits repeated and comma-separated skills", () => {
    expect(skillsFromQuery(["go", "rust, k8s", ""])).toEqual(["go", "rust", "k8s"]);
  });
});
