import { runCli } from './cli/commands';

runCli(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (e: unknown) => {
    console.error('[Looper] Unexpected failure:', e);
    process.exitCode = 1;
  },
);
