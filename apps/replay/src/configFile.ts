import { NavigationConfigError, resolveNavigationConfig, type NavigationConfig } from "@corridor-guide/nav-core";

import { readJsonFile } from "./trace";

/** Loads navigation config overrides from a JSON file and merges them over the defaults. */
export async function loadConfigFile(path: string): Promise<NavigationConfig> {
  const overrides = await readJsonFile(
    path,
    (reason) => new NavigationConfigError([`${path}: not valid JSON (${reason})`])
  );
  try {
    return resolveNavigationConfig(overrides);
  } catch (error) {
    if (error instanceof NavigationConfigError) {
      throw new NavigationConfigError(error.issues.map((issue) => `${path}: ${issue}`));
    }
    throw error;
  }
}
