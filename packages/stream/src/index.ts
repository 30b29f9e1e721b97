// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

export * from "./client.js";
export * from "./collection.js";
export * from "./decoder.js";
export * from "./events.js";
export * from "./network.js";
export * from "./schema.js";
