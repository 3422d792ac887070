import { z } from 'zod';

const configId = z.coerce.number().int().positive();
const count = z.number().int().min(0);

export const hookConfigSchema = z.object({
  name: z.string().min(1),
  command: z.string().min(1),
  shell: z.string().min(1).default('/bin/sh'),
  timeout: z.number().int().positive().default(300),
  environment_vars: z.record(z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/), z.string()).default({}),
  continue_on_failure: z.boolean().default(false),
  log_output: z.boolean().default(true),
  critical: z.boolean().default(false),
  run_on_job_failure: z.boolean().default(true),
});

export type HookConfig = z.infer<typeof hookConfigSchema>;

const baseParameters = {
  repository_name: z.string().optional(),
};

export const hookParametersSchema = z.object({
  ...baseParameters,
  hook_type: z.enum(['pre', 'post']).default('pre'),
  hooks: z.array(hookConfigSchema).default([]),
  critical: z.boolean().default(false),
  critical_failure: z.boolean().optional(),
  failed_critical_hook_name: z.string().optional(),
});

export const backupParametersSchema = z.object({
  ...baseParameters,
  source_path: z.string().min(1).optional(),
  archive_name: z.string().min(1).optional(),
  compression: z.string().min(1).optional(),
  patterns: z.array(z.string().min(1)).default([]),
  dry_run: z.boolean().default(false),
  ignore_lock: z.boolean().default(false),
});

export const pruneParametersSchema = z.object({
  ...baseParameters,
  keep_within: z.string().min(1).optional(),
  keep_secondly: count.optional(),
  keep_minutely: count.optional(),
  keep_hourly: count.optional(),
  keep_daily: count.optional(),
  keep_weekly: count.optional(),
  keep_monthly: count.optional(),
  keep_yearly: count.optional(),
  show_list: z.boolean().default(false),
  show_stats: z.boolean().default(true),
  save_space: z.boolean().default(false),
  force_prune: z.boolean().default(false),
  dry_run: z.boolean().default(false),
});

export const compactParametersSchema = z.object({
  ...baseParameters,
});

export const checkParametersSchema = z.object({
  ...baseParameters,
  check_type: z.enum(['full', 'repository_only', 'archives_only']).default('full'),
  verify_data: z.boolean().default(false),
  repair_mode: z.boolean().default(false),
  save_space: z.boolean().default(false),
  max_duration: z.number().int().positive().optional(),
  archive_prefix: z.string().min(1).optional(),
  archive_glob: z.string().min(1).optional(),
  first_n_archives: z.number().int().positive().optional(),
  last_n_archives: z.number().int().positive().optional(),
});

export const cloudSyncParametersSchema = z.object({
  ...baseParameters,
  cloud_sync_config_id: configId.optional(),
});

export const notificationParametersSchema = z.object({
  ...baseParameters,
  notification_config_id: configId.optional(),
  title: z.string().min(1).optional(),
  message: z.string().min(1).optional(),
  severity: z.enum(['success', 'info', 'warning', 'error']).optional(),
  priority: z.enum(['low', 'normal', 'high']).optional(),
});

const taskFields = {
  name: z.string().min(1),
};

export const taskDefinitionSchema = z.discriminatedUnion('kind', [
  z.object({ ...taskFields, kind: z.literal('hook'), parameters: hookParametersSchema.default({}) }),
  z.object({ ...taskFields, kind: z.literal('backup'), parameters: backupParametersSchema.default({}) }),
  z.object({ ...taskFields, kind: z.literal('prune'), parameters: pruneParametersSchema.default({}) }),
  z.object({ ...taskFields, kind: z.literal('compact'), parameters: compactParametersSchema.default({}) }),
  z.object({ ...taskFields, kind: z.literal('check'), parameters: checkParametersSchema.default({}) }),
  z.object({ ...taskFields, kind: z.literal('cloud_sync'), parameters: cloudSyncParametersSchema.default({}) }),
  z.object({
    ...taskFields,
    kind: z.literal('notification'),
    parameters: notificationParametersSchema.default({}),
  }),
]);

export type TaskDefinition = z.infer<typeof taskDefinitionSchema>;
export type TaskDefinitionInput = z.input<typeof taskDefinitionSchema>;

export const jobDefinitionSchema = z
  .object({
    job_type: z.enum(['simple', 'composite']).default('composite'),
    operation: z
      .enum(['backup', 'restore', 'list', 'check', 'prune', 'sync', 'composite'])
      .default('composite'),
    repository_id: configId.nullable().default(null),
    cloud_sync_config_id: configId.nullable().default(null),
    prune_config_id: configId.nullable().default(null),
    check_config_id: configId.nullable().default(null),
    notification_config_id: configId.nullable().default(null),
    tasks: z.array(taskDefinitionSchema).min(1),
  })
  .superRefine((definition, ctx) => {
    if (definition.job_type === 'simple' && definition.tasks.length !== 1) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['tasks'],
        message: 'A simple job carries exactly one task',
      });
    }
  });

export type JobDefinition = z.infer<typeof jobDefinitionSchema>;
export type JobDefinitionInput = z.input<typeof jobDefinitionSchema>;
