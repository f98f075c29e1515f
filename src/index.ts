import { main } from './main';
import { ConfigurationError } from './utils/errors';

main(process.argv.slice(2), process.env).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    // Raised before the configuration, and so the logger, exists
    if (err instanceof ConfigurationError) {
      console.error(`Configuration error: ${err.message}`);
    } else {
      console.error('Exporter failed:', err);
    }
    process.exitCode = 1;
  }
);
