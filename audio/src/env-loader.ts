// Loads .env before @strata/config parses process.env; import it first.
import { config } from 'dotenv';
import path from 'node:path';

// Working directory first, then its parent for runs from inside audio/.
// Values already set win over later files.
for (const file of [path.resolve(process.cwd(), '.env'), path.resolve(process.cwd(), '..', '.env')]) {
  config({ path: file });
}
