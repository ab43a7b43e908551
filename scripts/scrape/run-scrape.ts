#!/usr/bin/env node

/**
 * Entry point for the scraper CLI
 * Loads environment variables, then hands the arguments to the CLI
 */

// Load environment variables from .env.local or .env
import dotenv from 'dotenv';
import path from 'path';

// Try to load .env.local first, then .env from the working directory
dotenv.config({ path: path.resolve('.env.local') });
dotenv.config({ path: path.resolve('.env') });

import { main } from '../../src/cli';

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error('Scraper crashed:', error);
    process.exitCode = 1;
  }
);
