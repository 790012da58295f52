#!/usr/bin/env node
import 'dotenv/config';
import { runCli } from './main.js';

await runCli(process.argv);
