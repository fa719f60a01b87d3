#!/usr/bin/env node

import { buildProgram } from './cli/program.js';
import { handleCommandError } from './cli/command-error-handler.js';

buildProgram().parseAsync(process.argv).catch(handleCommandError);
