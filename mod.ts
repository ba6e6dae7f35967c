/**
 * Spoke - minimal HTTP router with typed path parameters.
 *
 * @example
 * ```typescript
 * import { Spoke } from "@spoke/core";
 *
 * const app = new Spoke();
 *
 * app.get("/", () => "<h1>Hello from Spoke!</h1>");
 * app.get("/user/<int:id>", (id) => `<p>User #${id}</p>`);
 *
 * await app.listen({ port: 8000 });
 * ```
 *
 * @module
 */

export * from "@spoke/core";
