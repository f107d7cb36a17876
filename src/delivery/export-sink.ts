import { mkdir, writeFile } from 'fs/promises';
import path from 'path';
import { SupabaseClient, createClient } from '@supabase/supabase-js';
import logger from '@/utils/logger';
import { DeliveryFailed, getErrorMessage } from '@/utils/error-handler';
import { ExportFile } from '@/reports/formatter';

/** Destination for report export files. */
export interface ExportSink {
  readonly name: string;
  /** Writes one file and returns where it landed. */
  write(file: ExportFile): Promise<string>;
}

export class LocalExportSink implements ExportSink {
  readonly name = 'local';

  constructor(private rootDir: string) {}

  async write(file: ExportFile): Promise<string> {
    const target = path.resolve(this.rootDir, file.path);

    try {
      await mkdir(path.dirname(target), { recursive: true });
      await writeFile(target, file.content, 'utf8');
    } catch (error) {
      throw new DeliveryFailed(`Could not write export ${file.path}: ${getErrorMessage(error)}`, [`export:${file.format}`], {
        cause: error,
        retryable: false,
        context: { target }
      });
    }

    logger.debug('Export written', { target, bytes: Buffer.byteLength(file.content) });
    return target;
  }
}

export class SupabaseExportSink implements ExportSink {
  readonly name = 'supabase';

  constructor(
    private client: SupabaseClient,
    private bucket: string
  ) {}

  async write(file: ExportFile): Promise<string> {
    const { data, error } = await this.client.storage
      .from(this.bucket)
      .upload(file.path, Buffer.from(file.content, 'utf8'), {
        contentType: file.contentType,
        upsert: true
      });

    if (error) {
      logger.error('Supabase export upload failed', { bucket: this.bucket, path: file.path, error: error.message });
      throw new DeliveryFailed(`Could not upload export ${file.path}: ${error.message}`, [`export:${file.format}`], {
        cause: error,
        context: { bucket: this.bucket }
      });
    }

    const location = `${this.bucket}/${data.path}`;
    logger.debug('Export uploaded', { location });
    return location;
  }
}

export function createSupabaseExportSink(options: {
  supabaseUrl: string;
  supabaseServiceKey: string;
  bucket: string;
}): SupabaseExportSink {
  const client = createClient(options.supabaseUrl, options.supabaseServiceKey, {
    auth: { persistSession: false, autoRefreshToken: false }
  });
  return new SupabaseExportSink(client, options.bucket);
}
