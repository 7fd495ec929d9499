import { once } from "node:events";
import type { Server } from "node:http";
import { afterAll, beforeAll, describe, expect, it, vi } from "vitest";
import { createApp } from "./app.js";
import type { PortalContext } from "./lib/context.js";
import { seedEmployer, seedSeeker, testPortal, tokenFor } from "./test/portal.js";

const posting = { title: "Backend Engineer", description: "Build APIs", location: "Remote", skills: ["go"] };

describe("express host", () => {
  let portal: PortalContext;
  let server: Server;
  let baseUrl: string;

  beforeAll(async () => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);

    portal = testPortal();
    server = createApp(portal).listen(0, "127.0.0.1");
    await once(server, "listening");

    const address = server.address();
    if (address === null || typeof address === "string") throw new Error("expected a TCP address");
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
    vi.restoreAllMocks();
  });

  it("serves the job list with and without the trailing slash", async () => {
    const withSlash = await fetch(`${baseUrl}/jobs/`);
    const withoutSlash = await fetch(`${baseUrl}/jobs`);

    expect(withSlash.status).toBe(200);
    expect(withSlash.headers.get("content-type")).toBe("application/json");
    expect(withSlash.headers.get("access-control-allow-origin")).toBe("*");
    expect(await withSlash.json()).toEqual([]);
    expect(await withoutSlash.json()).toEqual([]);
  });

  it("answers unknown paths with a 404 envelope", async () => {
    const res = await fetch(`${baseUrl}/nowhere`);

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: { code: "NOT_FOUND", message: "No route for GET /nowhere" } });
  });

  it("passes the Allow header of a 405 through to the client", async () => {
    const res = await fetch(`${baseUrl}/jobs/1`, { method: "PATCH" });

    expect(res.status).toBe(405);
    expect(res.headers.get("allow")).toBe("GET, PUT, DELETE");
    expect(await res.json()).toEqual({ error: { code: "METHOD_NOT_ALLOWED", message: "Method PATCH not allowed" } });
  });

  it("answers 413 for a body over the size limit", async () => {
    const res = await fetch(`${baseUrl}/auth/login`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ email: "sam@seeker.test", password: "x".repeat(2 * 1024 * 1024) }),
    });

    expect(res.status).toBe(413);
    expect(await res.json()).toEqual({ error: { code: "PAYLOAD_TOO_LARGE", message: "request entity too large" } });
  });

  it("answers 415 for a content encoding it cannot decode", async () => {
    const res = await fetch(`${baseUrl}/auth/login`, {
      method: "POST",
      headers: { "Content-Type": "application/json", "Content-Encoding": "br" },
      body: JSON.stringify({ email: "sam@seeker.test", password: "password1" }),
    });

    expect(res.status).toBe(415);
    expect(await res.json()).toEqual({ error: { code: "UNSUPPORTED_MEDIA_TYPE", message: 'unsupported content encoding "br"' } });
  });

  it("forwards the JSON body and bearer token to the function", async () => {
    const employer = seedEmployer(portal);
    const seeker = seedSeeker(portal);
    const job = portal.jobs.create(employer, posting);

    const res = await fetch(`${baseUrl}/applications/`, {
      method: "POST",
      headers: { "Content-Type": "application/json", Authorization: `Bearer ${tokenFor(portal, seeker)}` },
      body: JSON.stringify({ job_id: job.id, cover_letter: "Hello" }),
    });

    expect(res.status).toBe(201);
    expect(await res.json()).toMatchObject({ job_id: job.id, applicant_id: seeker.id, cover_letter: "Hello", status: "submitted" });
  });

  it("deletes a job with an empty 204", async () => {
    const employer = seedEmployer(portal, "owner@initech.test", "Initech");
    const job = portal.jobs.create(employer, posting);

    const res = await fetch(`${baseUrl}/jobs/${job.id}`, {
      method: "DELETE",
      headers: { Authorization: `Bearer ${tokenFor(portal, employer)}` },
    });

    expect(res.status).toBe(204);
    expect(await res.text()).toBe("");
    expect(portal.jobs.find(job.id)).toBeUndefined();
  });
});
