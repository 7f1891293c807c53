import { writeFile } from "node:fs/promises";
import { createApp } from "~/index";
import { loadConfig } from "~/lib/config";
import { buildServices } from "~/lib/services";
import { openApiConfig } from "~/lib/openapi";

// The document only depends on the routes; no request is ever served
const app = createApp(
  buildServices(loadConfig({ SIGNING_SECRET: "openapi-placeholder" })),
);
const doc = app.getOpenAPIDocument(openApiConfig);

const output = process.argv[2] ?? "./openapi.json";

try {
  const body = JSON.stringify(doc, null, 2);
  await writeFile(output, body);
  console.log(
    `OpenAPI document generated at ${output} (${(Buffer.byteLength(body) / 1024).toFixed(
      2,
    )} KB)`,
  );
} catch (error) {
  console.error("Failed to write OpenAPI document:", error);
  process.exitCode = 1;
}
