#!/usr/bin/env node
import { runCli } from './program';

async function main() {
  process.exitCode = await runCli(process.argv);
}

void main();
