/**
 * Main entry point for the fragmerge CLI application.
 */
import { main } from './index';

main(process.argv.slice(2))
  .then(exitCode => {
    process.exit(exitCode);
  })
  .catch((error: unknown) => {
    console.error(error);
    process.exit(1);
  });
