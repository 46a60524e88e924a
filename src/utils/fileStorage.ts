import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from 'node:fs';
import path from 'node:path';
import type { StateStorage } from 'zustand/middleware';

const isStringRecord = (value: unknown): value is Record<string, string> =>
  typeof value === 'object' &&
  value !== null &&
  !Array.isArray(value) &&
  Object.values(value).every((entry) => typeof entry === 'string');

const readItems = (filename: string): Map<string, string> => {
  if (!existsSync(filename)) {
    return new Map();
  }

  try {
    const parsed: unknown = JSON.parse(readFileSync(filename, 'utf8'));
    if (isStringRecord(parsed)) {
      return new Map(Object.entries(parsed));
    }
    console.warn(`Ignoring unexpected contents in ${filename}`);
  } catch (error) {
    console.warn(`Could not read ${filename}, starting empty:`, error);
  }
  return new Map();
};

/**
 * Durable key-value storage kept in one JSON file. Preferences and the
 * persisted stores all live here. Each write replaces the whole file by
 * writing a temporary sibling and renaming it over the original.
 */
export const createFileStorage = (filename: string): StateStorage => {
  const items = readItems(filename);

  const flush = () => {
    mkdirSync(path.dirname(filename), { recursive: true });
    const temporary = `${filename}.tmp`;
    writeFileSync(temporary, JSON.stringify(Object.fromEntries(items)), 'utf8');
    renameSync(temporary, filename);
  };

  return {
    getItem: (name) => items.get(name) ?? null,
    setItem: (name, value) => {
      items.set(name, value);
      flush();
    },
    removeItem: (name) => {
      if (items.delete(name)) {
        flush();
      }
    },
  };
};
