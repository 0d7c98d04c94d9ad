#!/usr/bin/env tsx
import { config } from "dotenv";
import { runCli } from "./cli.js";

config();

const controller = new AbortController();
process.once("SIGINT", () => controller.abort());

process.exitCode = await runCli(process.argv, { signal: controller.signal });
