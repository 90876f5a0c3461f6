#!/usr/bin/env node
import { runCli } from './runner.js';

process.exitCode = runCli(process.argv);
