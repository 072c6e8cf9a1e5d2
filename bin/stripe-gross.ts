#!/usr/bin/env node
import { runGrossVolume } from '../handlers/gross-volume/handler';

// Argos shows whatever reaches stdout; failures are rendered, never thrown.
runGrossVolume()
  .then((output) => {
    process.stdout.write(`${output}\n`);
  })
  .catch((error: unknown) => {
    console.error('Unexpected failure', error);
    process.stdout.write('⚠ Stripe\n---\nUnexpected failure, see logs\n');
  })
  .finally(() => {
    process.exitCode = 0;
  });
