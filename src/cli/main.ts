#!/usr/bin/env node
import { createCli } from "./program.js";

await createCli().runExit(process.argv.slice(2));
