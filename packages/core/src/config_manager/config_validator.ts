import Ajv from "ajv";
import type { ErrorObject, ValidateFunction } from "ajv";
import changelogConfigSchema from "./changelog_config.schema.json";
import type { ChangelogConfigFile } from "./config_manager.types";
import type { ConfigFieldError } from "../errors";

let validator: ValidateFunction<ChangelogConfigFile> | null = null;

/**
 * Compiles the configuration schema once and caches the validator.
 */
function getValidator(): ValidateFunction<ChangelogConfigFile> {
  if (!validator) {
    const ajv = new Ajv({ allErrors: true });
    validator = ajv.compile<ChangelogConfigFile>(changelogConfigSchema);
  }
  return validator;
}

function formatError(error: ErrorObject): ConfigFieldError {
  const missing = error.params['missingProperty'];
  const extra = error.params['additionalProperty'];
  const base = error.instancePath.replace(/^\//, '').replace(/\//g, '.');

  let field = base || 'root';
  if (typeof missing === 'string') {
    field = base ? `${base}.${missing}` : missing;
  } else if (typeof extra === 'string') {
    field = base ? `${base}.${extra}` : extra;
  }

  return { field, message: error.message || 'Unknown validation error' };
}

/**
 * Schema-based validation for a raw configuration document
 */
export function validateChangelogConfig(
  data: unknown
): { isValid: true; config: ChangelogConfigFile } | { isValid: false; errors: ConfigFieldError[] } {
  const validate = getValidator();

  if (validate(data)) {
    return { isValid: true, config: data };
  }

  return {
    isValid: false,
    errors: (validate.errors ?? []).map(formatError),
  };
}
