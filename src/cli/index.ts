#!/usr/bin/env node

import { Command } from "@effect/cli";
import { NodeContext, NodeRuntime } from "@effect/platform-node";
import { Effect } from "effect";

import { deployCommand } from "./commands/deploy";

const cli = Command.run(deployCommand, {
  name: "deploy-master",
  version: "0.1.0",
});

// Deployment errors are printed by the command itself; any failure exits 1.
NodeRuntime.runMain(
  cli(process.argv).pipe(Effect.provide(NodeContext.layer)),
  { disableErrorReporting: true }
);
