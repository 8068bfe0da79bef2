import { promises as fs } from 'fs';
import path from 'path';
import { Attachment, JsonObject } from '../types';

const IMAGE_MEDIA_TYPES: Record<string, string> = {
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.gif': 'image/gif',
  '.webp': 'image/webp',
};

export function imageMediaType(filePath: string | undefined): string {
  if (!filePath) return 'image/jpeg';
  return IMAGE_MEDIA_TYPES[path.extname(filePath).toLowerCase()] ?? 'image/jpeg';
}

/** Content block for one attachment; image paths are read relative to `cwd`. */
export async function encodeAttachment(attachment: Attachment, cwd: string): Promise<JsonObject> {
  switch (attachment.type) {
    case 'image': {
      let data = attachment.data;
      if (data === undefined && attachment.path) {
        const buffer = await fs.readFile(path.resolve(cwd, attachment.path));
        data = buffer.toString('base64');
      }
      if (data === undefined) throw new Error('Image attachment needs either data or a path');
      return {
        type: 'image',
        source: { type: 'base64', media_type: attachment.mediaType ?? imageMediaType(attachment.path), data },
      };
    }
    case 'document': {
      const block: JsonObject = {
        type: 'document',
        source: { type: 'text', media_type: 'text/plain', data: attachment.text },
      };
      if (attachment.title) block.title = attachment.title;
      return block;
    }
    case 'file':
      return { type: 'text', text: `[Attached file: ${attachment.path}]` };
  }
}

/** Text block first, then one block per attachment. */
export async function buildUserContent(text: string, attachments: Attachment[], cwd: string): Promise<JsonObject[]> {
  const content: JsonObject[] = [];
  if (text.trim()) content.push({ type: 'text', text });
  for (const attachment of attachments) {
    content.push(await encodeAttachment(attachment, cwd));
  }
  return content;
}
