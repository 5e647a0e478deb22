#!/usr/bin/env tsx
import dotenv from "dotenv";
import { runCli } from "./program";

dotenv.config();

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error) => {
    console.error("Error in CLI:", error);
    process.exit(1);
  });
