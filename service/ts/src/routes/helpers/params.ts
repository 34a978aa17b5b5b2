import { z } from 'zod';

import { MAX_ROW_ID } from '../../store/index.js';

export const IdParamSchema = z.object({
  id: z.coerce.number().int().nonnegative().max(MAX_ROW_ID),
});

export const StreamFlag = z
  .enum(['true', 'false', '1', '0'])
  .optional()
  .transform((value) => value === 'true' || value === '1');
