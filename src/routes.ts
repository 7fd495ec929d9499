import type { PortalModule } from "./lib/http.js";
import * as health from "../functions/health.js";
import * as docs from "../functions/docs.js";
import * as authRegister from "../functions/auth-register.js";
import * as authLogin from "../functions/auth-login.js";
import * as authToken from "../functions/auth-token.js";
import * as jobs from "../functions/jobs.js";
import * as job from "../functions/job.js";
import * as applications from "../functions/applications.js";
import * as applicationsMy from "../functions/applications-my.js";
import * as applicationsForJob from "../functions/applications-for-job.js";
import * as applicationReview from "../functions/application-review.js";
import * as dashboardJobseeker from "../functions/dashboard-jobseeker.js";
import * as dashboardEmployer from "../functions/dashboard-employer.js";

// Literal paths before parameterised ones that could shadow them
export const functions: PortalModule[] = [
  health,
  docs,
  authRegister,
  authLogin,
  authToken,
  jobs,
  job,
  applicationsMy,
  applicationsForJob,
  applications,
  applicationReview,
  dashboardJobseeker,
  dashboardEmployer,
];
