#!/usr/bin/env node
/**
 * @fileoverview Standalone debug adapter entry point (DAP over stdio).
 */

import { DebugSession } from '@vscode/debugadapter';
import { BfDebugSession } from './debug/adapter';

DebugSession.run(BfDebugSession);
