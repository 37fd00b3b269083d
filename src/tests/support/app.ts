// App mit In-Process-Stand-ins: kein Redis, keine DB, kein SMTP.

import type { FastifyInstance } from "fastify";
import { buildApp, type AppOptions } from "../../app.js";
import { makeDeps, signAccessToken, type TestDeps } from "./deps.js";

export type TestApp = {
  app: FastifyInstance;
  deps: TestDeps;
};

export async function buildTestApp(opts: AppOptions = {}): Promise<TestApp> {
  const deps = makeDeps();
  const app = await buildApp({ logger: false, useRedis: false, ...opts, deps });
  await app.ready();
  return { app, deps };
}

export async function bearer(userId: string): Promise<{ authorization: string }> {
  return { authorization: `Bearer ${await signAccessToken(userId)}` };
}
