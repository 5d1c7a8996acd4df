import * as path from 'node:path';
import * as os from 'node:os';
import * as fs from 'node:fs/promises';
import { z } from 'zod';
import type { CountryCode } from 'libphonenumber-js';
import { toCountryCode } from './contacts/normalize.js';
import { errorMessage, logger } from './utils/index.js';

export interface AppConfig {
  contactsFile: string;
  tasksFile: string;
  defaultCountry: CountryCode;
}

export const DEFAULT_CONTACTS_FILE = 'contacts.json';
export const DEFAULT_TASKS_FILE = 'tasks.json';

const configFileSchema = z.object({
  contactsFile: z.string().min(1).optional(),
  tasksFile: z.string().min(1).optional(),
  defaultCountry: z.string().optional(),
});

type ConfigFile = z.infer<typeof configFileSchema>;

/**
 * Data files default to the working directory. A JSON config file may move
 * them; `CONTACT_BOOK_FILE` and `CONTACT_BOOK_TASKS_FILE` override both.
 */
export async function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): Promise<AppConfig> {
  const configPath = env.CONTACT_BOOK_CONFIG
    ?? path.join(os.homedir(), '.contact-book', 'config.json');

  const file = await readConfigFile(configPath);

  let defaultCountry: CountryCode = 'US';
  if (file.defaultCountry) {
    const country = toCountryCode(file.defaultCountry);
    if (country) {
      defaultCountry = country;
    } else {
      logger.warn('Unknown defaultCountry in', configPath, '-', file.defaultCountry);
    }
  }

  return {
    contactsFile: path.resolve(cwd, env.CONTACT_BOOK_FILE ?? file.contactsFile ?? DEFAULT_CONTACTS_FILE),
    tasksFile: path.resolve(cwd, env.CONTACT_BOOK_TASKS_FILE ?? file.tasksFile ?? DEFAULT_TASKS_FILE),
    defaultCountry,
  };
}

async function readConfigFile(configPath: string): Promise<ConfigFile> {
  let raw: string;
  try {
    raw = await fs.readFile(configPath, 'utf-8');
  } catch {
    // No config file yet - defaults apply
    return {};
  }

  try {
    const parsed = configFileSchema.safeParse(JSON.parse(raw));
    if (parsed.success) return parsed.data;
    logger.warn('Ignoring invalid config file', configPath, '-', parsed.error.issues[0]?.message);
  } catch (err) {
    logger.warn('Ignoring unreadable config file', configPath, '-', errorMessage(err));
  }
  return {};
}
