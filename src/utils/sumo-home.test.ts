import { describe, it, expect } from "vitest";
import { requireSumoHome } from "./sumo-home";
import { PreconditionError } from "../types";

describe("requireSumoHome", () => {
  it("returns the declared toolkit root", () => {
    expect(requireSumoHome({ SUMO_HOME: "/opt/sumo" })).toBe("/opt/sumo");
  });

  it.each([{}, { SUMO_HOME: "" }])("fails when the variable is missing (%o)", (env) => {
    expect(() => requireSumoHome(env)).toThrow(PreconditionError);
    expect(() => requireSumoHome(env)).toThrow(
      "please declare environment variable 'SUMO_HOME'",
    );
  });
});
