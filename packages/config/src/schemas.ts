import { z } from 'zod';

// Agent-side connection settings (used by the SDK connector)
export const ConnectorConfigSchema = z.object({
  host: z.string().min(1),
  port: z.number().int().min(1).max(65535),
  agentId: z.string().min(1),
  metadata: z.record(z.unknown()).default({}),
  connectTimeoutMs: z.number().int().positive(),
});
export type ConnectorConfig = z.infer<typeof ConnectorConfigSchema>;

export const SimpleMessagingConfigSchema = z
  .object({
    maxHistorySize: z.number().int().positive(),
    historyTrimBatch: z.number().int().positive(),
    storagePrefix: z.string().min(1),
  })
  .refine((cfg) => cfg.historyTrimBatch <= cfg.maxHistorySize, {
    message: 'historyTrimBatch must not exceed maxHistorySize',
    path: ['historyTrimBatch'],
  });
export type SimpleMessagingConfig = z.infer<typeof SimpleMessagingConfigSchema>;
