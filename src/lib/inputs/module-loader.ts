import { resolve } from "path";
import { pathToFileURL } from "url";
import { ModuleLoadError } from "../../utils/errors.js";

export type LoadedFunction = (...args: unknown[]) => unknown;

/**
 * Import `modulePath` and return its `exportName` export as a callable
 */
export async function loadOperation(
  modulePath: string,
  exportName = "default",
): Promise<LoadedFunction> {
  const moduleUrl = pathToFileURL(resolve(modulePath)).href;

  let loaded: unknown;
  try {
    loaded = await import(moduleUrl);
  } catch (error) {
    throw new ModuleLoadError(
      `Failed to load module: ${modulePath}`,
      { modulePath },
      { cause: error },
    );
  }

  const exported: unknown =
    typeof loaded === "object" && loaded !== null
      ? Reflect.get(loaded, exportName)
      : undefined;

  if (typeof exported !== "function") {
    throw new ModuleLoadError(
      `Export "${exportName}" of ${modulePath} is not a function`,
      { modulePath, exportName, type: typeof exported },
    );
  }

  return (...args: unknown[]): unknown =>
    Reflect.apply(exported, undefined, args);
}
