import * as fs from 'fs';
import * as path from 'path';

export function writeDigest(outputPath: string, html: string): void {
  fs.mkdirSync(path.dirname(outputPath), { recursive: true });
  fs.writeFileSync(outputPath, html, 'utf-8');
}
