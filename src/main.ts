// Entry point intentionally small.
// Full bootstrapping lives in src/app/createApp.ts.

import { createApp } from './app/createApp';

createApp();
