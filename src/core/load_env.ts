/**
 * Side-effect import: loads .env.local, then .env, before any module reads
 * process.env. Must be the first import of an entry point.
 */

import dotenv from 'dotenv';
import { resolve } from 'path';

dotenv.config({ path: resolve(process.cwd(), '.env.local') });
dotenv.config();
