import process from 'node:process';
import { runCli } from '../src/leyning/cli';

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    console.error('[leyning] Fatal error:', err);
    process.exitCode = 1;
  });
