#!/usr/bin/env node

import { createProgram } from './index.js';

createProgram().parse(process.argv);
