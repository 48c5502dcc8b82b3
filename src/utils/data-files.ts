import { readFileSync } from 'fs';

/** Reads a JSON file from the project's `data/` directory (beside `src/` and `dist/`). */
export function readDataFile(name: string): unknown {
    const url = new URL(`../../data/${name}`, import.meta.url);
    return JSON.parse(readFileSync(url, 'utf-8'));
}
