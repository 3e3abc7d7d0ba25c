import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

export interface TempDir {
  root: string;
  writeJson(relativePath: string, data: unknown): string;
  writeText(relativePath: string, text: string): string;
  remove(): void;
}

export function createTempDir(): TempDir {
  const root = fs.mkdtempSync(path.join(os.tmpdir(), 'anim-rebuild-'));

  const writeText = (relativePath: string, text: string): string => {
    const filePath = path.join(root, relativePath);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, text);
    return filePath;
  };

  return {
    root,
    writeText,
    writeJson: (relativePath, data) => writeText(relativePath, JSON.stringify(data)),
    remove: () => fs.rmSync(root, { recursive: true, force: true })
  };
}
