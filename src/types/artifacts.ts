/**
 * Artifact type definitions
 *
 * An artifact is a file in the workspace with a fixed, convention-based name.
 * Stages locate their inputs by key, never by passed handle.
 */

import type { ArtifactsConfig } from "./config";

// "osm" is the copied map extract; its name depends on the input file
export type ArtifactKey = keyof ArtifactsConfig | "osm";

export type ArtifactFormat =
  | "map"
  | "netconvert-config"
  | "network"
  | "additional"
  | "pt-lines"
  | "routes"
  | "taz"
  | "csv"
  | "polygon-prefix"
  | "od-matrix"
  | "activitygen-config"
  | "scenario-config";

export const ARTIFACT_FORMATS: Record<ArtifactKey, ArtifactFormat> = {
  osm: "map",
  netconvertConfig: "netconvert-config",
  net: "network",
  ptStops: "additional",
  ptLines: "pt-lines",
  sideParking: "additional",
  ptFlows: "routes",
  parkingAreas: "additional",
  completeParking: "additional",
  parkingRerouters: "additional",
  polygons: "additional",
  taz: "taz",
  odWeights: "csv",
  buildingsPrefix: "polygon-prefix",
  odMatrix: "od-matrix",
  genericActivityGen: "activitygen-config",
  specificActivityGen: "activitygen-config",
  scenarioConfig: "scenario-config",
};

/**
 * Prefix artifacts name a family of files (e.g. buildings/osm_buildings.*)
 * One exists once any file starting with the prefix does
 */
export function isPrefixArtifact(key: ArtifactKey): boolean {
  return ARTIFACT_FORMATS[key] === "polygon-prefix";
}
