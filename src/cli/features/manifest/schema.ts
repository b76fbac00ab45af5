/**
 * JSON schema for build-manifest.json - single source of truth for validation
 */

import ajvModule from "ajv";
import ajvFormatsModule from "ajv-formats";

import type { ErrorObject } from "ajv";

// Both packages are CommonJS; under NodeNext the default import is module.exports
const Ajv = ajvModule.default;
const addFormats = ajvFormatsModule.default;

export const MANIFEST_SCHEMA_VERSION = "1.0.0";

export const HOOK_NAME_PATTERN = "^[a-zA-Z0-9_-]+$";

const manifestSchema = {
  type: "object",
  required: ["version", "build", "hooks"],
  properties: {
    version: { type: "string", pattern: "^\\d+\\.\\d+\\.\\d+$" },
    build: {
      type: "object",
      required: ["date", "image", "base", "commit"],
      properties: {
        date: { type: "string", minLength: 1, format: "date-time" },
        image: { type: "string", minLength: 1 },
        base: { type: "string", minLength: 1 },
        commit: { type: "string", minLength: 1 },
      },
    },
    hooks: {
      type: "object",
      minProperties: 1,
      propertyNames: { pattern: HOOK_NAME_PATTERN },
      additionalProperties: {
        type: "object",
        required: ["version", "dependencies"],
        properties: {
          version: { type: "string", pattern: "^[a-f0-9]{8}$" },
          dependencies: {
            type: "array",
            minItems: 1,
            items: { type: "string", minLength: 1 },
          },
          metadata: { type: "object" },
        },
      },
    },
  },
};

// allErrors: a malformed manifest must report every defect in one pass
const ajv = new Ajv({ allErrors: true });
addFormats(ajv);

export const validateManifestSchema = ajv.compile(manifestSchema);

/**
 * Split an Ajv instance path into its segments
 * @param instancePath - JSON pointer such as "/hooks/wallpaper/version"
 *
 * @returns Decoded path segments
 */
const pointerSegments = (instancePath: string): Array<string> => {
  return instancePath
    .split("/")
    .slice(1)
    .map((segment) => segment.replace(/~1/g, "/").replace(/~0/g, "~"));
};

/**
 * Turn one Ajv error into a human-readable violation
 * @param err - Ajv error object
 *
 * @returns Violation message
 */
export const formatSchemaError = (err: ErrorObject): string => {
  const segments = pointerSegments(err.instancePath);
  const hookName = segments[0] === "hooks" ? segments[1] : undefined;
  const field = segments.length > 0 ? segments.join(".") : "(root)";

  if (err.keyword === "required") {
    const missing = String(err.params.missingProperty);
    if (hookName != null) {
      return `Hook '${hookName}' missing required field: ${missing}`;
    }
    return `Missing required field: ${
      segments.length > 0 ? `${field}.${missing}` : missing
    }`;
  }

  if (hookName != null && segments.length === 3) {
    const [, , property] = segments;
    if (property === "version") {
      return `Hook '${hookName}' has invalid version format (expected 8 lowercase hex characters)`;
    }
    if (property === "dependencies" && err.keyword === "minItems") {
      return `Hook '${hookName}' has empty dependencies array`;
    }
    return `Hook '${hookName}' field ${property} ${err.message ?? "is invalid"}`;
  }

  if (err.keyword === "minProperties" && field === "hooks") {
    return "hooks object cannot be empty";
  }

  if (err.keyword === "propertyNames") {
    return `Invalid hook name: ${String(err.params.propertyName)}`;
  }

  if (err.keyword === "pattern" && field === "version") {
    return "Invalid version format (expected semver)";
  }

  if (err.keyword === "minLength") {
    return `Field ${field} must not be empty`;
  }

  return `Field ${field} ${err.message ?? "is invalid"}`;
};
