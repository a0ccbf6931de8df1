#!/usr/bin/env node
/**
 * Page URL Resolver - CLI Entry Point
 *
 * This file serves as the bin entry point for global npm installation.
 * It simply imports and runs the main module.
 *
 * Usage:
 *   page-url-resolver --dsn ./site.db --pid 42 --roots
 *   node dist/bin.js --dsn ./site.db --query "SELECT uid FROM pages WHERE hidden = 0"
 *
 * @module bin
 */

import './index.js';
