import { readFileSync } from 'fs';
import { createRequire } from 'module';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';

const __dirname = dirname(fileURLToPath(import.meta.url));
const require = createRequire(import.meta.url);

const LOGIN_PAGE_PATH = join(__dirname, '../static/login.html');

let loginPage: string | null = null;
let sha3Script: string | null = null;

export function renderLoginPage(error = ''): string {
  if (loginPage === null) loginPage = readFileSync(LOGIN_PAGE_PATH, 'utf-8');
  return loginPage.replace('{{error}}', error);
}

/** Browser build of js-sha3; exposes the sha3_512 global the login page hashes with */
export function sha3BrowserScript(): string {
  if (sha3Script === null) sha3Script = readFileSync(require.resolve('js-sha3'), 'utf-8');
  return sha3Script;
}
