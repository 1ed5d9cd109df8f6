/**
 * Load .env.local (and .env) before any other imports that read env at load
 * time (e.g. the Ollama model table in @roleradar/llm).
 * Import this first in scripts: import './load-env'
 */
import { config } from 'dotenv';
import path from 'path';

config({ path: path.resolve(process.cwd(), '.env.local') });
config();
