/** Reads compiler defaults and document settings from config/compiler.md */

import { readFile } from "node:fs/promises";
import { join } from "node:path";
import type { ServerConfig } from "../types/config.ts";
import {
  DEFAULT_COMPILER_CONFIG,
  DEFAULT_DOCUMENT_CONFIG,
} from "../types/config.ts";

/** Load configuration from config/compiler.md, falling back to defaults */
export async function loadServerConfig(projectPath: string): Promise<ServerConfig> {
  let content: string;
  try {
    content = await readFile(join(projectPath, "config", "compiler.md"), "utf-8");
  } catch {
    return parseServerConfig("");
  }
  return parseServerConfig(content);
}

/** Extract settings from markdown content */
export function parseServerConfig(content: string): ServerConfig {
  const typeDefaults = { ...DEFAULT_COMPILER_CONFIG.typeDefaults };
  const document = { ...DEFAULT_DOCUMENT_CONFIG };

  const dateExample = matchLabel(content, "Date example");
  if (dateExample) {
    typeDefaults.date = { ...typeDefaults.date, example: dateExample };
  }

  const datetimeExample = matchLabel(content, "Datetime example");
  if (datetimeExample) {
    typeDefaults.datetime = { ...typeDefaults.datetime, example: datetimeExample };
  }

  const apiVersion = matchLabel(content, "API version");
  if (apiVersion) document.apiVersion = apiVersion;

  const openApiVersion = matchLabel(content, "OpenAPI version");
  if (openApiVersion) document.openApiVersion = openApiVersion;

  return { compiler: { typeDefaults }, document };
}

/** Value after a bold label such as `**API version:** 2.1.0` */
function matchLabel(content: string, label: string): string | undefined {
  const match = content.match(new RegExp(`\\*\\*${label}:\\*\\*[ \\t]*(.+)`, "i"));
  const value = match?.[1]?.trim().replace(/^`(.*)`$/, "$1");
  return value || undefined;
}
