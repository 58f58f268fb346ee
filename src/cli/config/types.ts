/**
 * CLI configuration types
 */

import type { EngineConfigSection } from "../../utils/config-loader.js";

export interface GenerateConfig {
  fromUrl?: boolean;
}

export interface ExpandConfig {
  count?: number;
}

export interface ReplicateConfig {
  factor?: number;
}

export interface SubstituteConfig {
  endpointsFile?: string;
  endpointsUrl?: string;
}

/**
 * Complete configuration file structure
 */
export interface FixtureConfigFile {
  engine?: EngineConfigSection;
  generate?: GenerateConfig;
  expand?: ExpandConfig;
  replicate?: ReplicateConfig;
  substitute?: SubstituteConfig;
}

/**
 * CLI command options (from commander)
 */
export interface GenerateCommandOptions {
  fromUrl?: boolean;
  fetchTimeout?: number;
  config?: string;
}

export interface ExpandCommandOptions {
  count?: number;
  namePrefix?: string;
  config?: string;
}

export interface ReplicateCommandOptions {
  factor?: number;
  config?: string;
}

export interface SubstituteCommandOptions {
  endpointsFile?: string;
  endpointsUrl?: string;
  keys?: string;
  fetchTimeout?: number;
  config?: string;
}

export interface ValidateCommandOptions {
  reportPath?: string;
}
