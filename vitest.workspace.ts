import { defineWorkspace } from 'vitest/config';

export default defineWorkspace(['packages/game-logic', 'packages/backend']);
