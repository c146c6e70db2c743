import { readdir, readFile } from 'node:fs/promises';
import path from 'node:path';

/** `*.txt` files of a folder keyed by file stem, in sorted order, contents trimmed. */
export async function loadTextFiles(folder: string): Promise<Map<string, string>> {
  const entries = await readdir(folder, { withFileTypes: true });
  const names = entries
    .filter((entry) => entry.isFile() && path.extname(entry.name) === '.txt')
    .map((entry) => entry.name)
    .sort();

  const data = new Map<string, string>();
  for (const name of names) {
    const text = await readFile(path.join(folder, name), 'utf-8');
    data.set(path.basename(name, '.txt'), text.trim());
  }
  return data;
}

export function commonIds(a: Map<string, string>, b: Map<string, string>): string[] {
  return [...a.keys()].filter((id) => b.has(id)).sort();
}
