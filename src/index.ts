import 'dotenv/config';
import { createCliDeps, runCli } from './cli';

const controller = new AbortController();

process.on('SIGINT', () => {
  console.error('[cli] SIGINT received, finishing current sub-batch...');
  controller.abort();
});

const deps = createCliDeps();

runCli(process.argv.slice(2), deps, controller.signal)
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error('[cli] Unexpected failure', err);
    process.exitCode = 1;
  });
