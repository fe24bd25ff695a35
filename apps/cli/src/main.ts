#!/usr/bin/env node
import "./lib/envBootstrap";
import { runCli } from "./cli";

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    console.error(err);
    process.exit(1);
  });
