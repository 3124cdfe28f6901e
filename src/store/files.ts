import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';

const fileMetadataSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  path: z.string().min(1),
  uploadedAt: z.string().optional(),
});

export type FileMetadata = z.infer<typeof fileMetadataSchema>;

export type FileStore = {
  saveFile(meta: FileMetadata): void;
  getFileById(id: string): FileMetadata | undefined;
  getFilePathById(id: string): string | undefined;
};

/** Uploaded-document metadata, mirrored to `<dataDir>/files.json` on every change. */
export const createFileStore = (dataDir: string): FileStore => {
  const storePath = path.join(dataDir, 'files.json');
  const filesById = new Map<string, FileMetadata>();

  const loadStoreFromDisk = (): void => {
    if (!fs.existsSync(storePath)) {
      return;
    }

    try {
      const raw = fs.readFileSync(storePath, 'utf-8');
      if (!raw.trim()) {
        return;
      }

      const parsed = z.array(z.unknown()).parse(JSON.parse(raw));
      parsed.forEach((entry) => {
        const result = fileMetadataSchema.safeParse(entry);
        if (result.success) {
          filesById.set(result.data.id, result.data);
        }
      });
    } catch (error) {
      console.error('[STORE] Failed to load file store from disk:', error);
    }
  };

  const persistStore = (): void => {
    fs.mkdirSync(dataDir, { recursive: true });
    const payload = JSON.stringify(Array.from(filesById.values()), null, 2);
    fs.writeFileSync(storePath, payload);
  };

  loadStoreFromDisk();

  return {
    saveFile(meta) {
      filesById.set(meta.id, meta);
      try {
        persistStore();
      } catch (error) {
        console.error('[STORE] Failed to persist file store:', error);
      }
    },
    getFileById: (id) => filesById.get(id),
    getFilePathById: (id) => filesById.get(id)?.path,
  };
};
