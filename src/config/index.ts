import dotenv from 'dotenv';
import path from 'path';
import fs from 'fs';

// Load .env whether the process is started from the project root or from dist/
// 1) Prefer CWD/.env
// 2) Fallback to the project .env resolved relative to this file
(() => {
  const cwdEnv = path.resolve(process.cwd(), '.env');
  const projectEnv = path.resolve(__dirname, '../../.env');
  if (fs.existsSync(cwdEnv)) {
    dotenv.config({ path: cwdEnv });
  } else if (fs.existsSync(projectEnv)) {
    dotenv.config({ path: projectEnv });
  } else {
    dotenv.config();
  }
})();

export const config = {
  port: process.env.PORT ? Number(process.env.PORT) : 4000
};

export default config;
