import { createHash } from 'node:crypto';

// Line endings are normalized so a file touched by a Windows editor is not seen as changed.
export function normalizeContent(content: string): string {
  return content.replace(/\r\n/g, '\n');
}

export function hashContent(content: string): string {
  return createHash('sha256').update(normalizeContent(content), 'utf8').digest('hex');
}
