import { loadEnvFiles } from '../lib/element-export/config';
import { runElementExport } from '../lib/element-export/cli';

// Load env vars
loadEnvFiles();

process.exitCode = runElementExport(process.argv.slice(2));
