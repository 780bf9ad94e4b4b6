// Root router

import { router } from '../index.js';
import { gamesRouter } from './games.js';

export const appRouter = router({
  games: gamesRouter,
});

export type AppRouter = typeof appRouter;
