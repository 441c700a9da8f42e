import { Hono } from 'hono';
import type { AppBindings } from '../../../types/context.js';
import { monthlySummaryRoute } from './monthly.js';
import { trailingMonthsRoute } from './trailing.js';

const summariesRoute = new Hono<AppBindings>();

summariesRoute.route('/', monthlySummaryRoute);
summariesRoute.route('/', trailingMonthsRoute);

export { summariesRoute };
