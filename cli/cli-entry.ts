#!/usr/bin/env node
/**
 * Main entry point for the trialkit CLI application.
 */
import { main } from './index';

export { main };

main().catch(error => {
  console.error(error);
  process.exit(1);
});
