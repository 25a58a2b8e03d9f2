import { z } from 'zod';
import { LOG_LEVELS } from '../utils/logger';

const probability = z.number().min(0).max(1);

const sizeSchema = z.object({
  width: z.number().positive(),
  height: z.number().positive(),
});

const oddWindow = z
  .number()
  .int()
  .positive()
  .refine(value => value % 2 === 1, { message: 'window must be an odd integer' });

export const frameConfigSchema = z
  .object({
    width: z.number().int().positive().default(1920),
    height: z.number().int().positive().default(1080),
    borderMargin: z.number().nonnegative().default(50),
  })
  .default({});

export const detectionConfigSchema = z
  .object({
    minConfidence: probability.default(0.5),
    minSize: sizeSchema.default({ width: 10, height: 10 }),
    maxSize: sizeSchema.default({ width: 500, height: 500 }),
    duplicateIouThreshold: probability.default(0.7),
    positionStrategy: z.enum(['best', 'mean']).default('best'),
  })
  .default({})
  .refine(value => value.minSize.width <= value.maxSize.width && value.minSize.height <= value.maxSize.height, {
    message: 'minSize must not exceed maxSize',
    path: ['minSize'],
  });

export const outlierConfigSchema = z
  .discriminatedUnion('method', [
    z.object({ method: z.literal('zscore'), threshold: z.number().positive().default(3.0) }),
    z.object({ method: z.literal('iqr'), multiplier: z.number().positive().default(1.5) }),
    z.object({
      method: z.literal('density'),
      neighbors: z.number().int().positive().default(5),
      threshold: z.number().positive().default(3.0),
    }),
  ])
  .default({ method: 'zscore', threshold: 3.0 });

export const smoothingConfigSchema = z.object({
  enabled: z.boolean().default(false),
  window: oddWindow.default(5),
});

export const cleaningConfigSchema = z
  .object({
    columns: z.array(z.string()).default(['xCenter', 'yCenter', 'meanConfidence', 'maxConfidence', 'bboxArea']),
    outlier: outlierConfigSchema,
    resolution: z.enum(['remove', 'interpolate', 'clip']).default('interpolate'),
    smoothing: smoothingConfigSchema.default({}),
    normalization: z.enum(['none', 'minmax', 'standard', 'robust']).default('none'),
  })
  .default({})
  .refine(value => !(value.outlier.method === 'density' && value.resolution === 'clip'), {
    message: 'clip resolution has no bound for the density outlier method',
    path: ['resolution'],
  });

export const movementConfigSchema = z
  .object({
    // 未指定ならフレーム対角線の半分 / 分
    maxSpeedPxPerMinute: z.number().positive().optional(),
    jitterThreshold: z.number().nonnegative().default(0),
    outlierRemoval: z
      .object({
        enabled: z.boolean().default(true),
        threshold: z.number().positive().default(3.0),
        minSamples: z.number().int().nonnegative().default(5),
      })
      .default({}),
    smoothing: z
      .object({
        enabled: z.boolean().default(true),
        window: oddWindow.default(5),
      })
      .default({}),
  })
  .default({});

export const observationConfigSchema = z
  .object({
    intervalMinutes: z.number().positive().default(1),
    periodMinutes: z.number().positive().default(1440),
  })
  .default({});

export const featuresConfigSchema = z
  .object({
    rollingWindow: z.number().int().positive().default(10),
    resampleMinutes: z
      .number()
      .int()
      .positive()
      .refine(value => 1440 % value === 0, { message: 'resampleMinutes must divide a day (1440 minutes)' })
      .default(10),
    seasonalityThreshold: z.number().positive().max(1).default(0.3),
  })
  .default({});

export const appConfigSchema = z.object({
  frame: frameConfigSchema,
  detection: detectionConfigSchema,
  cleaning: cleaningConfigSchema,
  movement: movementConfigSchema,
  observation: observationConfigSchema,
  features: featuresConfigSchema,
  logging: z
    .object({
      level: z.enum(LOG_LEVELS).default('info'),
    })
    .default({}),
  logDir: z.string().min(1).default('./logs'),
});

export type AppConfig = z.infer<typeof appConfigSchema>;
export type AppConfigInput = z.input<typeof appConfigSchema>;
export type FrameConfig = AppConfig['frame'];
export type DetectionConfig = AppConfig['detection'];
export type CleaningConfig = AppConfig['cleaning'];
export type NormalizationMethod = CleaningConfig['normalization'];
export type MovementConfig = AppConfig['movement'];
