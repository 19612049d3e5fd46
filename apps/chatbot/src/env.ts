// Load environment variables from the repository root .env file.
// Imported first so LOG_LEVEL applies to loggers created at module load.
import { config } from 'dotenv';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';

const __dirname = dirname(fileURLToPath(import.meta.url));
config({ path: resolve(__dirname, '../../../.env') });
