#!/usr/bin/env tsx
/**
 * workday CLI
 * Workday arithmetic from the command line
 */

// Load environment variables from .env file
import 'dotenv/config';

import { buildProgram } from '../src/program.js';

buildProgram().parse(process.argv);
