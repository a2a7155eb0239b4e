#!/usr/bin/env node
/* eslint-disable no-console */
import { runCli } from '../cli';

runCli(process.argv)
  .then((code) => { process.exitCode = code; })
  .catch((e) => { console.error(e); process.exitCode = 1; });
