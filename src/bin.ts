#!/usr/bin/env node
/**
 * CLI entry point for global installation.
 *
 * Usage:
 *   cxr-report-rag          # after npm install -g
 *   node dist/index.js      # direct invocation
 *
 * @module bin
 */

import './index.js';
