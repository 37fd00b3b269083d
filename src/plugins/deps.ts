// src/plugins/deps.ts
// Haengt die Flow-Abhaengigkeiten als app.deps an (Tests reichen Stand-ins rein).

import fp from "fastify-plugin";
import type { FastifyPluginAsync } from "fastify";
import type { AuthDeps } from "../deps.js";

export type DepsPluginOptions = {
  deps: AuthDeps;
};

const depsPlugin: FastifyPluginAsync<DepsPluginOptions> = async (app, opts) => {
  app.decorate("deps", opts.deps);
};

export default fp(depsPlugin, { name: "deps" });
