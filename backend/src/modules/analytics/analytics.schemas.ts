import { z } from 'zod';
import { ANALYTICS_WINDOWS } from './analytics.types';

export const dashboardQuerySchema = z.object({
  window: z.enum(ANALYTICS_WINDOWS).default('7d'),
});

export type DashboardQuery = z.infer<typeof dashboardQuerySchema>;
