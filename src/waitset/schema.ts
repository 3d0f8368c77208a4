import { z } from 'zod';

export const DEFAULT_WAITSET_CAPACITY = 128;
export const MAX_WAITSET_CAPACITY = 1024;

export const WaitSetCapacitySchema = z
  .number()
  .int('Wait-set capacity must be an integer')
  .min(1)
  .max(MAX_WAITSET_CAPACITY);

export const WaitSetOptionsSchema = z.object({
  capacity: WaitSetCapacitySchema.default(DEFAULT_WAITSET_CAPACITY)
});

export const TriggerGroupIdSchema = z
  .number()
  .int('Trigger group id must be an integer')
  .nonnegative()
  .max(Number.MAX_SAFE_INTEGER);

export const WaitTimeoutSchema = z.number().nonnegative().finite();

export type WaitSetSettings = z.infer<typeof WaitSetOptionsSchema>;
