import { defineFunction, json, type FunctionConfig } from "../src/lib/http.js";
import { APPLICATION_STATUSES, ROLES } from "../src/lib/types.js";

const bearer = [{ bearerAuth: [] }];
const jsonBody = (ref: string) => ({
  required: true,
  content: { "application/json": { schema: { $ref: `#/components/schemas/${ref}` } } },
});
const jsonResult = (description: string, ref: string) => ({
  description,
  content: { "application/json": { schema: { $ref: `#/components/schemas/${ref}` } } },
});
const jsonList = (description: string, ref: string) => ({
  description,
  content: { "application/json": { schema: { type: "array", items: { $ref: `#/components/schemas/${ref}` } } } },
});
const idParam = (name: string) => ({ name, in: "path", required: true, schema: { type: "integer" } });
const error = (description: string) => ({ description, content: { "application/json": { schema: { $ref: "#/components/schemas/Error" } } } });

export const openApiDocument = {
  openapi: "3.0.3",
  info: {
    title: "Job Portal API",
    version: "1.0.0",
    description: "Job seekers and employers: registration, job postings, applications and dashboards. All data is held in memory.",
  },
  tags: [
    { name: "auth", description: "Registration and login" },
    { name: "jobs", description: "Job CRUD and search" },
    { name: "applications", description: "Applying and reviewing" },
    { name: "dashboard", description: "Per-role dashboards" },
  ],
  paths: {
    "/auth/register/jobseeker": {
      post: {
        tags: ["auth"],
        summary: "Register a job seeker",
        requestBody: jsonBody("JobSeekerRegistration"),
        responses: { "201": jsonResult("Registered", "UserSummary"), "409": error("Email already registered"), "422": error("Invalid body") },
      },
    },
    "/auth/register/employer": {
      post: {
        tags: ["auth"],
        summary: "Register an employer",
        requestBody: jsonBody("EmployerRegistration"),
        responses: { "201": jsonResult("Registered", "UserSummary"), "409": error("Email already registered"), "422": error("Invalid body") },
      },
    },
    "/auth/login": {
      post: {
        tags: ["auth"],
        summary: "Log in and get an access token",
        requestBody: jsonBody("Login"),
        responses: { "200": jsonResult("Token issued", "AccessToken"), "401": error("Bad credentials") },
      },
    },
    "/auth/token": {
      post: {
        tags: ["auth"],
        summary: "OAuth2 password grant",
        requestBody: {
          required: true,
          content: {
            "application/x-www-form-urlencoded": {
              schema: {
                type: "object",
                required: ["username", "password"],
                properties: {
                  username: { type: "string", format: "email" },
                  password: { type: "string" },
                  scope: { type: "string", description: `Space-separated; the first of ${ROLES.join(", ")} picks the role` },
                },
              },
            },
          },
        },
        responses: { "200": jsonResult("Token issued", "AccessToken"), "401": error("Bad credentials") },
      },
    },
    "/jobs/": {
      get: {
        tags: ["jobs"],
        summary: "List jobs",
        parameters: [
          { name: "query", in: "query", schema: { type: "string" }, description: "Substring of title or description" },
          { name: "location", in: "query", schema: { type: "string" }, description: "Substring of location" },
          { name: "skills", in: "query", schema: { type: "array", items: { type: "string" } }, description: "Every skill must be listed on the job" },
        ],
        responses: { "200": jsonList("Matching jobs", "Job") },
      },
      post: {
        tags: ["jobs"],
        summary: "Post a job",
        security: bearer,
        requestBody: jsonBody("JobInput"),
        responses: { "201": jsonResult("Created", "Job"), "401": error("Not authenticated"), "403": error("Not an employer") },
      },
    },
    "/jobs/{id}": {
      get: {
        tags: ["jobs"],
        summary: "Get a job",
        parameters: [idParam("id")],
        responses: { "200": jsonResult("Job", "Job"), "404": error("Job not found") },
      },
      put: {
        tags: ["jobs"],
        summary: "Update a job",
        security: bearer,
        parameters: [idParam("id")],
        requestBody: jsonBody("JobUpdate"),
        responses: { "200": jsonResult("Updated", "Job"), "403": error("Not the owner"), "404": error("Job not found") },
      },
      delete: {
        tags: ["jobs"],
        summary: "Delete a job",
        security: bearer,
        parameters: [idParam("id")],
        responses: { "204": { description: "Deleted" }, "403": error("Not the owner"), "404": error("Job not found") },
      },
    },
    "/applications/": {
      post: {
        tags: ["applications"],
        summary: "Apply for a job",
        security: bearer,
        requestBody: jsonBody("ApplicationInput"),
        responses: {
          "201": jsonResult("Created", "Application"),
          "403": error("Not a job seeker"),
          "404": error("Job not found"),
          "409": error("Already applied"),
        },
      },
    },
    "/applications/my": {
      get: {
        tags: ["applications"],
        summary: "List my applications",
        security: bearer,
        responses: { "200": jsonList("Applications", "Application") },
      },
    },
    "/applications/for-job/{job_id}": {
      get: {
        tags: ["applications"],
        summary: "List applications for a job",
        security: bearer,
        parameters: [idParam("job_id")],
        responses: { "200": jsonList("Applications", "Application"), "403": error("Not the owner"), "404": error("Job not found") },
      },
    },
    "/applications/{id}/review": {
      put: {
        tags: ["applications"],
        summary: "Set an application's status",
        security: bearer,
        parameters: [idParam("id")],
        requestBody: jsonBody("Review"),
        responses: { "200": jsonResult("Updated", "Application"), "403": error("Not the owner"), "404": error("Application not found") },
      },
    },
    "/dashboard/jobseeker": {
      get: { tags: ["dashboard"], summary: "Job seeker dashboard", security: bearer, responses: { "200": { description: "Dashboard" } } },
    },
    "/dashboard/employer": {
      get: { tags: ["dashboard"], summary: "Employer dashboard", security: bearer, responses: { "200": { description: "Dashboard" } } },
    },
  },
  components: {
    securitySchemes: {
      bearerAuth: { type: "http", scheme: "bearer", bearerFormat: "JWT" },
    },
    schemas: {
      Error: {
        type: "object",
        properties: {
          error: {
            type: "object",
            properties: {
              code: { type: "string" },
              message: { type: "string" },
              details: { type: "array", items: { type: "object", properties: { field: { type: "string" }, message: { type: "string" } } } },
            },
          },
        },
      },
      UserSummary: {
        type: "object",
        properties: {
          id: { type: "string" },
          email: { type: "string", format: "email" },
          name: { type: "string" },
          role: { type: "string", enum: [...ROLES] },
        },
      },
      JobSeekerRegistration: {
        type: "object",
        required: ["email", "password", "name"],
        properties: {
          email: { type: "string", format: "email" },
          password: { type: "string", minLength: 6 },
          name: { type: "string" },
          resume: { type: "string", nullable: true },
        },
      },
      EmployerRegistration: {
        type: "object",
        required: ["email", "password", "name", "company_name"],
        properties: {
          email: { type: "string", format: "email" },
          password: { type: "string", minLength: 6 },
          name: { type: "string" },
          company_name: { type: "string" },
        },
      },
      Login: {
        type: "object",
        required: ["email", "password"],
        properties: {
          email: { type: "string", format: "email" },
          password: { type: "string" },
          role: { type: "string", enum: [...ROLES] },
        },
      },
      AccessToken: {
        type: "object",
        properties: {
          access_token: { type: "string" },
          token_type: { type: "string", enum: ["bearer"] },
          expires_in: { type: "integer" },
        },
      },
      JobInput: {
        type: "object",
        required: ["title", "description", "location"],
        properties: {
          title: { type: "string" },
          description: { type: "string" },
          company: { type: "string" },
          location: { type: "string" },
          skills: { type: "array", items: { type: "string" } },
          salary_min: { type: "integer", nullable: true },
          salary_max: { type: "integer", nullable: true },
        },
      },
      JobUpdate: { allOf: [{ $ref: "#/components/schemas/JobInput" }], description: "Every field optional" },
      Job: {
        allOf: [
          { $ref: "#/components/schemas/JobInput" },
          {
            type: "object",
            properties: {
              id: { type: "integer" },
              employer_id: { type: "string" },
              posted_by: { type: "string", format: "email" },
              created_at: { type: "string", format: "date-time" },
              updated_at: { type: "string", format: "date-time" },
            },
          },
        ],
      },
      ApplicationInput: {
        type: "object",
        required: ["job_id"],
        properties: {
          job_id: { type: "integer" },
          cover_letter: { type: "string", nullable: true },
        },
      },
      Review: {
        type: "object",
        required: ["status"],
        properties: { status: { type: "string", enum: [...APPLICATION_STATUSES] } },
      },
      Application: {
        type: "object",
        properties: {
          id: { type: "integer" },
          job_id: { type: "integer" },
          applicant_id: { type: "string" },
          seeker_email: { type: "string", format: "email" },
          cover_letter: { type: "string", nullable: true },
          status: { type: "string", enum: [...APPLICATION_STATUSES] },
          applied_at: { type: "string", format: "date-time" },
          updated_at: { type: "string", format: "date-time" },
        },
      },
    },
  },
};

const swaggerHtml = `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="utf-8" />
  <meta name="viewport" content="width=device-width, initial-scale=1" />
  <title>Job Portal API - Docs</title>
  <link rel="stylesheet" href="https://unpkg.com/swagger-ui-dist@5.11.0/swagger-ui.css" />
</head>
<body>
  <div id="swagger-ui"></div>
  <script src="https://unpkg.com/swagger-ui-dist@5.11.0/swagger-ui-bundle.js"></script>
  <script>
    SwaggerUIBundle({
      spec: ${JSON.stringify(openApiDocument)},
      dom_id: '#swagger-ui',
      deepLinking: true,
      presets: [SwaggerUIBundle.presets.apis, SwaggerUIBundle.SwaggerUIStandalonePreset],
      layout: "BaseLayout",
    });
  </script>
</body>
</html>`;

/**
 * GET /docs              - Swagger UI
 * GET /docs?format=json  - raw OpenAPI document
 */
export const config: FunctionConfig = {
  path: "/docs",
  method: ["GET"],
};

export default defineFunction(config, async (req) => {
  const url = new URL(req.url);
  if (url.searchParams.get("format") === "json") {
    return json(openApiDocument);
  }
  return new Response(swaggerHtml, {
    headers: { "Content-Type": "text/html" },
  });
});
