/**
 * Entry point for the update-pr-refs GitHub Action.
 */

import { run } from './main';

void run();
