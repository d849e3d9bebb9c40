import { PutObjectCommand } from '@aws-sdk/client-s3';
import { s3Client, BUCKET_NAME } from '../config/minio';
import type { CorpusFile } from './csv';

/**
 * Object key for a corpus file:
 * corpus/YYYY/MM/DD/{run_id}/{file}
 */
export function backupKey(runId: string, fileName: string, now: Date = new Date()): string {
  const year = now.getUTCFullYear();
  const month = String(now.getUTCMonth() + 1).padStart(2, '0');
  const day = String(now.getUTCDate()).padStart(2, '0');
  return `corpus/${year}/${month}/${day}/${runId}/${fileName}`;
}

/**
 * Back up rendered tables to MinIO (S3-compatible storage).
 *
 * Keeps every run's output so a model trained on it can be traced back to
 * the exact files. Returns the uploaded keys.
 */
export async function backupCorpus(
  files: readonly CorpusFile[],
  runId: string,
  now: Date = new Date()
): Promise<string[]> {
  const keys: string[] = [];

  for (const file of files) {
    const key = backupKey(runId, file.name, now);
    await s3Client.send(
      new PutObjectCommand({
        Bucket: BUCKET_NAME,
        Key: key,
        Body: file.content,
        ContentType: 'text/csv',
      })
    );
    keys.push(key);
  }

  return keys;
}
