import { createApp } from "./app.js";
import { createPortalContext } from "./lib/context.js";
import { functions } from "./routes.js";

const portal = createPortalContext();
const app = createApp(portal);

app.listen(portal.config.port, () => {
  console.log(`Job portal API listening on http://localhost:${portal.config.port}`);
  for (const { config } of functions) {
    console.log(`  ${config.method.join(",").padEnd(15)} ${config.path}`);
  }
});
