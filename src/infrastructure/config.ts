import dotenv from 'dotenv';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { existsSync } from 'fs';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Find project root by looking for package.json (works from src/ and dist/)
function findProjectRoot(startPath: string): string {
  let currentPath = startPath;
  while (currentPath !== dirname(currentPath)) {
    if (existsSync(join(currentPath, 'package.json'))) {
      return currentPath;
    }
    currentPath = dirname(currentPath);
  }
  return process.cwd();
}

// Load environment exactly once for any module that imports config
export const PROJECT_ROOT = findProjectRoot(__dirname);
dotenv.config({ path: join(PROJECT_ROOT, '.env') });

export const SERVICE_NAME = 'chat-protocol-bridge';
export const SERVICE_VERSION = process.env.npm_package_version || 'dev';
