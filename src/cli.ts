#!/usr/bin/env node
import dotenv from "dotenv";
dotenv.config();
import { runAnalyzeCommand } from "./commands/analyze.command";

runAnalyzeCommand(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    console.error("Unexpected failure", err);
    process.exitCode = 1;
  });
