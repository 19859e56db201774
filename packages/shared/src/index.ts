// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

export * from './errors/index.js';
export * from './logger/index.js';
export * from './utils/index.js';
