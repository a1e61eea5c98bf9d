import * as Sentry from "@sentry/node";
import "dotenv/config";
import { createApp } from "./app.js";
import { loadSlackAuthConfig } from "./config.js";

Sentry.init({ dsn: process.env.SENTRY_DSN });

const config = loadSlackAuthConfig();
const app = createApp({ config });

app.listen(config.port, () => {
  console.log(`Server is running on http://localhost:${config.port}`);
  console.log(`Sign in at http://localhost:${config.port}/login`);
});
