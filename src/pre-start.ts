/**
 * Loads environment variables before anything else reads process.env.
 * ENV_FILE picks a file other than ./.env; a missing file is not an error.
 */

import path from 'path';
import dotenv from 'dotenv';

const envFile = process.env.ENV_FILE || '.env';

dotenv.config({ path: path.resolve(process.cwd(), envFile) });
