import { describe, expect, it } from "vitest";
import * as seekerDashboard from "./dashboard-jobseeker.js";
import * as employerDashboard from "./dashboard-employer.js";
import { call, seedEmployer, seedSeeker, testPortal, tokenFor } from "../src/test/portal.js";

describe("dashboards", () => {
  it("serves each role its own dashboard and forbids the other", async () => {
    const portal = testPortal();
    const employer = seedEmployer(portal);
    const seeker = seedSeeker(portal);
    portal.jobs.create(employer, { title: "Backend Engineer", description: "", location: "Remote", skills: [] });
    portal.applications.apply(seeker, 1);

    const mine = await call(seekerDashboard, portal, { token: tokenFor(portal, seeker) });
    expect(mine.status).toBe(200);
    expect(mine.body).toMatchObject({ user: { role: "jobseeker" }, num_applications: 1 });

    const theirs = await call(employerDashboard, portal, { token: tokenFor(portal, employer) });
    expect(theirs.status).toBe(200);
    expect(theirs.body).toMatchObject({ user: { role: "employer", email: "boss@acme.test" }, num_jobs_posted: 1, num_applications: 1 });

    expect((await call(seekerDashboard, portal, { token: tokenFor(portal, employer) })).status).toBe(403);
    expect((await call(employerDashboard, portal, { token: tokenFor(portal, seeker) })).status).toBe(403);
    expect((await call(employerDashboard, portal)).status).toBe(401);
  });
});
