/**
 * Basic server example demonstrating core Spoke features.
 *
 * Run with:
 *   npm run example
 */

import { loadEnvConfig, Spoke, useRequest } from "../mod.ts";

const settings = loadEnvConfig();

const app = new Spoke({ log: { level: settings.logLevel ?? "info" } })
  .get("/", () => "<h1>Welcome to Spoke!</h1>")
  .get("/hello", () => "<p>Hello, world</p>")
  .get("/user/<int:id>", (id) => `<p>User #${id}, next is #${id + 1}</p>`)
  .get("/item/<slug>", (slug) => `<p>Item: ${slug}</p>`)
  .get("/price/<float:amount>", (amount) =>
    `<p>With tax: ${(amount * 1.2).toFixed(2)}</p>`)
  .get("/search", () => {
    const { query } = useRequest();
    return `<p>Searching for ${query.q ?? "nothing"}</p>`;
  })
  .route("/form", ["GET", "POST"], () => {
    const { method } = useRequest();
    return `<p>Form via ${method}</p>`;
  })
  .get("/boom", () => {
    throw new Error("Something broke");
  });

await app.listen({
  hostname: settings.hostname,
  port: settings.port,
  onListen: ({ port }) => {
    console.log("\nTry these endpoints:");
    console.log(`  GET  http://localhost:${port}/user/42`);
    console.log(`  GET  http://localhost:${port}/item/red-shoes`);
    console.log(`  GET  http://localhost:${port}/price/9.99`);
    console.log(`  GET  http://localhost:${port}/search?q=boots`);
    console.log(`  POST http://localhost:${port}/form`);
    console.log(`  GET  http://localhost:${port}/boom`);
  },
});

process.once("SIGINT", () => {
  app.close().then(
    () => process.exit(0),
    (error: unknown) => {
      console.error(error);
      process.exit(1);
    },
  );
});
