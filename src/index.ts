#!/usr/bin/env node
/**
 * tf-tag-guard CLI entrypoint
 */

// Import and execute CLI - the CLI handles its own argument parsing
import './cli.js';
