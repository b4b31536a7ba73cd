#!/usr/bin/env node
// src/index.ts
import { main } from "./cli";

process.exitCode = main(process.argv.slice(2));
