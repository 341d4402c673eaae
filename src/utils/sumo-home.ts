import { PreconditionError } from "../types";

export const SUMO_HOME_VARIABLE = "SUMO_HOME";

/**
 * Read the simulation toolkit root from the environment
 * Throws before any stage can run when it is not declared
 */
export function requireSumoHome(env: NodeJS.ProcessEnv): string {
  const value = env[SUMO_HOME_VARIABLE];
  if (!value) {
    throw new PreconditionError(
      `please declare environment variable '${SUMO_HOME_VARIABLE}'`,
    );
  }
  return value;
}
