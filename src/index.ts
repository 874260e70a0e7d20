#!/usr/bin/env node

import dotenv from "dotenv";
import { run } from "./cli/index.js";

dotenv.config();

void run(process.argv.slice(2)).then((exitCode) => {
  process.exitCode = exitCode;
});
