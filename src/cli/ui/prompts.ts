/**
 * Interactive prompts wrapper
 */

import * as p from "@clack/prompts";

export const confirm = p.confirm;
export const select = p.select;
export const isCancel = p.isCancel;
