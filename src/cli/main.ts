#!/usr/bin/env node
// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import { runCli } from './index.js';

process.exitCode = runCli(process.argv.slice(2));
