// Environment variable loader - must be imported first
import dotenv from 'dotenv';
import path from 'node:path';

// Project root when started from the repository, then the parent directory
// when started from inside bot/.
dotenv.config({ path: path.resolve(process.cwd(), '.env') });
dotenv.config({ path: path.resolve(process.cwd(), '..', '.env') });
