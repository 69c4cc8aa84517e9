// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import { AsyncLocalStorage } from 'node:async_hooks';
import type { SubstitutionContext } from './context.js';

/**
 * Session scoped to the current async call chain.
 */
export const activeContext = new AsyncLocalStorage<SubstitutionContext>();

/**
 * The innermost open substitution session, if any.
 */
export function currentSubstitutionContext(): SubstitutionContext | null {
  return activeContext.getStore() ?? null;
}
