import { readFile } from 'fs/promises';
import { InvalidArgumentError } from '../domain/errors/archive.errors';
import { SkyPositionVO } from '../domain/value-objects/sky-position.vo';

/**
 * Parse a source list: one "ra dec" pair per line. Blank lines, comment lines
 * starting with '#' and lines with fewer than two fields are skipped.
 */
export function parseSourceList(text: string, origin = 'source list'): SkyPositionVO[] {
  const positions: SkyPositionVO[] = [];

  text.split(/\r?\n/).forEach((line, index) => {
    if (line.startsWith('#')) {
      return;
    }
    const fields = line.trim().split(/\s+/);
    if (fields.length < 2) {
      return;
    }

    try {
      positions.push(SkyPositionVO.parse(fields[0], fields[1]));
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new InvalidArgumentError(`${origin} line ${index + 1}: ${reason}`);
    }
  });

  return positions;
}

export async function readSourceList(path: string): Promise<SkyPositionVO[]> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new InvalidArgumentError(`Unable to read source list ${path}: ${reason}`);
  }
  return parseSourceList(text, path);
}
