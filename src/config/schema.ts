import { z } from 'zod';
import { BackupMode, RetentionTrigger } from '../interfaces/BackupConfig';

const connectionSchema = z.object({
  host: z.string().default(''),
  port: z.number().int().min(1).max(65535).optional(),
  username: z.string().default(''),
  password: z.string().default(''),
  database: z.string().default(''),
});

export const localStorageSchema = z.object({
  driver: z.literal('local'),
  path: z.string().min(1),
  filename_prefix: z.string().optional(),
});

export const s3StorageSchema = z.object({
  driver: z.literal('s3'),
  bucket: z.string().min(1),
  region: z.string().min(1),
  prefix: z.string().optional(),
  endpoint: z.string().url().optional(),
  access_key_id: z.string().min(1).optional(),
  secret_access_key: z.string().min(1).optional(),
  filename_prefix: z.string().optional(),
});

export const storageConfigSchema = z.discriminatedUnion('driver', [localStorageSchema, s3StorageSchema]);

export type StorageDocument = z.infer<typeof storageConfigSchema>;

export const storageReferenceSchema = z.object({
  ref: z.string().min(1),
  prefix: z.string().optional(),
  filename_prefix: z.string().optional(),
});

const scheduleSchema = z.object({
  cron: z.string().min(1),
  timezone: z.string().min(1).optional(),
});

export const jobSchema = z.object({
  name: z.string().min(1),
  driver: z.enum(['postgresql', 'postgres', 'mysql']),
  connection: connectionSchema,
  schedule: scheduleSchema.optional(),
  mode: z.nativeEnum(BackupMode).default(BackupMode.BASIC),
  parallel_jobs: z.number().int().min(1).default(2),
  binary_path: z.string().min(1).optional(),
  retention: z.string().min(1).optional(),
  storage: z.union([storageReferenceSchema, storageConfigSchema]).optional(),
});

const settingsSchema = z.object({
  max_concurrent_jobs: z.number().int().min(1).default(2),
  scratch_dir: z.string().min(1).optional(),
  retention_trigger: z.nativeEnum(RetentionTrigger).default(RetentionTrigger.AFTER_BACKUP),
  log_level: z.string().optional(),
  binary: z
    .object({
      pg_dump: z.string().min(1).optional(),
      mysqldump: z.string().min(1).optional(),
    })
    .default({}),
});

export const configDocumentSchema = z
  .object({
    settings: settingsSchema.default({}),
    storages: z.record(storageConfigSchema).optional(),
    backups: z.array(jobSchema).default([]),
  })
  .superRefine((document, ctx) => {
    const checkCredentialPair = (storage: StorageDocument | { ref: string }, path: (string | number)[]) => {
      if ('driver' in storage && storage.driver === 's3') {
        if ((storage.access_key_id === undefined) !== (storage.secret_access_key === undefined)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: 'access_key_id and secret_access_key must be provided together',
            path: [...path, 'access_key_id'],
          });
        }
      }
    };

    for (const [name, storage] of Object.entries(document.storages ?? {})) {
      checkCredentialPair(storage, ['storages', name]);
    }

    const seen = new Set<string>();
    document.backups.forEach((job, index) => {
      if (seen.has(job.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Duplicate backup name '${job.name}'`,
          path: ['backups', index, 'name'],
        });
      }
      seen.add(job.name);

      if (job.storage) {
        checkCredentialPair(job.storage, ['backups', index, 'storage']);
      }

      if (job.mode === BackupMode.PARALLEL && job.driver === 'mysql') {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: 'parallel mode is only supported for postgresql',
          path: ['backups', index, 'mode'],
        });
      }
    });
  });

export type ConfigDocument = z.infer<typeof configDocumentSchema>;
export type JobDocument = z.infer<typeof jobSchema>;
