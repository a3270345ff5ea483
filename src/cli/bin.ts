#!/usr/bin/env node
import path from "node:path";
import dotenv from "dotenv";
import { resolveLogger } from "../types";
import { runListDialogs } from "./list-dialogs";

dotenv.config({ path: path.join(process.cwd(), ".env") });

runListDialogs(process.argv.slice(2), {
  env: process.env,
  logger: resolveLogger(),
  write: (line) => process.stdout.write(`${line}\n`),
})
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    console.error("[cli] unexpected failure", err);
    process.exitCode = 1;
  });
