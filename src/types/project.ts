import type { SchemaRegistry } from "../registry/schema-registry.ts";
import type { ServerConfig } from "./config.ts";

/** The loaded state of a schema project */
export interface Project {
  /** Absolute path to the project root folder */
  rootPath: string;
  /** Project metadata from project.md */
  name: string;
  description: string;
  config: ServerConfig;
  /** Frozen registry holding every compiled schema */
  registry: SchemaRegistry;
  /** Source file of each schema, relative to the project root */
  sources: Map<string, string>;
}

