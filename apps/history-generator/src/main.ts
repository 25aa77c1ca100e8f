import 'reflect-metadata';
import { runCli } from './cli/runCli';

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    console.error('[HistoryGenerator] Fatal error:', err);
    process.exit(1);
  });
