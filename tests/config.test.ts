import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { loadConfig } from '../src/config.js';
import { createTempDir } from './helpers.js';

let dir: string;
let cleanup: () => Promise<void>;

beforeEach(async () => {
  ({ dir, cleanup } = await createTempDir());
});

afterEach(async () => {
  await cleanup();
});

describe('loadConfig', () => {
  it('should default to files in the working directory', async () => {
    const config = await loadConfig({ CONTACT_BOOK_CONFIG: path.join(dir, 'none.json') }, dir);

    expect(config).toEqual({
      contactsFile: path.join(dir, 'contacts.json'),
      tasksFile: path.join(dir, 'tasks.json'),
      defaultCountry: 'US',
    });
  });

  it('should read paths and country from the config file', async () => {
    const configPath = path.join(dir, 'config.json');
    await fs.writeFile(configPath, JSON.stringify({
      contactsFile: 'data/book.json',
      tasksFile: '/var/tmp/todo.json',
      defaultCountry: 'gb',
    }), 'utf-8');

    const config = await loadConfig({ CONTACT_BOOK_CONFIG: configPath }, dir);

    expect(config).toEqual({
      contactsFile: path.join(dir, 'data', 'book.json'),
      tasksFile: '/var/tmp/todo.json',
      defaultCountry: 'GB',
    });
  });

  it('should let environment variables override the config file', async () => {
    const configPath = path.join(dir, 'config.json');
    await fs.writeFile(configPath, JSON.stringify({ contactsFile: 'from-file.json' }), 'utf-8');

    const config = await loadConfig({
      CONTACT_BOOK_CONFIG: configPath,
      CONTACT_BOOK_FILE: 'from-env.json',
      CONTACT_BOOK_TASKS_FILE: 'todo.json',
    }, dir);

    expect(config.contactsFile).toBe(path.join(dir, 'from-env.json'));
    expect(config.tasksFile).toBe(path.join(dir, 'todo.json'));
  });

  it('should ignore an invalid config file', async () => {
    const configPath = path.join(dir, 'config.json');
    await fs.writeFile(configPath, '{"contactsFile": 42}', 'utf-8');

    const config = await loadConfig({ CONTACT_BOOK_CONFIG: configPath }, dir);

    expect(config.contactsFile).toBe(path.join(dir, 'contacts.json'));
  });

  it('should keep the default country when the configured one is unknown', async () => {
    const configPath = path.join(dir, 'config.json');
    await fs.writeFile(configPath, '{"defaultCountry": "XX"}', 'utf-8');

    const config = await loadConfig({ CONTACT_BOOK_CONFIG: configPath }, dir);

    expect(config.defaultCountry).toBe('US');
  });
});
