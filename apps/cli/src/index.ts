#!/usr/bin/env tsx

import { createProgram } from './program.js';

createProgram().parse();
