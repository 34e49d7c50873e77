import dotenv from 'dotenv';

dotenv.config({ path: '../../.env.local' });
dotenv.config({ path: '../../.env' });

import { deliverPendingCommunications } from './deliver';
import { serializeError, logger } from '../observability/logger';

// npm run messaging:deliver [-- <limit>]
const limit = Number(process.argv[2] ?? 100);

deliverPendingCommunications(Number.isInteger(limit) && limit > 0 ? limit : 100)
  .then(({ failed }) => {
    process.exit(failed > 0 ? 1 : 0);
  })
  .catch((err: unknown) => {
    logger.error('Communication delivery failed', { error: serializeError(err) });
    process.exit(1);
  });
