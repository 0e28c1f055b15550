import dotenv from 'dotenv';
import path from 'path';
import { fileURLToPath } from 'url';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

// Root .env first, then one in the working directory for anything it leaves unset.
export const ROOT_ENV_FILE = path.join(__dirname, '../../../../.env');

dotenv.config({ path: ROOT_ENV_FILE });
dotenv.config();
