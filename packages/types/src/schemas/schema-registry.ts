import AjvModule from 'ajv';
import ajvFormatsModule from 'ajv-formats';
import { readFileSync } from 'fs';
import { resolve, dirname } from 'path';
import { fileURLToPath } from 'url';

// Both packages are CommonJS; under NodeNext the default import is the module
// object and the class/plugin sits on `.default`.
const Ajv = AjvModule.default;
const addFormats = ajvFormatsModule.default;

type AjvValidateFunction = ReturnType<InstanceType<typeof Ajv>['compile']>;

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export type SchemaVersion = 'v1';

export const AVAILABLE_SCHEMA_VERSIONS: readonly SchemaVersion[] = ['v1'] as const;
export const DEFAULT_SCHEMA_VERSION: SchemaVersion = 'v1';

const schemaCache = new Map<SchemaVersion, object>();

/**
 * Get the file path for a schema version
 */
export function getSchemaPath(version: SchemaVersion): string {
  const schemaDir = resolve(__dirname, '../../schemas');
  return resolve(schemaDir, `statement-result.${version}.schema.json`);
}

function isSchemaObject(value: unknown): value is object {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Load and return the JSON schema for a given version
 */
export function getSchema(version: SchemaVersion): object {
  assertValidSchemaVersion(version);

  const cached = schemaCache.get(version);
  if (cached !== undefined) {
    return cached;
  }

  const schemaContent = readFileSync(getSchemaPath(version), 'utf-8');
  const schema: unknown = JSON.parse(schemaContent);
  if (!isSchemaObject(schema)) {
    throw new Error(`Schema file for version "${version}" does not contain a JSON object`);
  }
  schemaCache.set(version, schema);
  return schema;
}

export function isValidSchemaVersion(version: string): version is SchemaVersion {
  return AVAILABLE_SCHEMA_VERSIONS.some((available) => available === version);
}

export function assertValidSchemaVersion(version: string): asserts version is SchemaVersion {
  if (!isValidSchemaVersion(version)) {
    throw new Error(
      `Invalid schema version: "${version}". Available versions: ${AVAILABLE_SCHEMA_VERSIONS.join(', ')}`
    );
  }
}

export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
}

export interface ValidationError {
  path: string;
  message: string;
  keyword: string;
}

const validatorCache = new Map<SchemaVersion, AjvValidateFunction>();

function getValidator(version: SchemaVersion): AjvValidateFunction {
  const cached = validatorCache.get(version);
  if (cached !== undefined) {
    return cached;
  }

  const ajv = new Ajv({
    allErrors: true,
    strict: false,
    validateFormats: true,
  });
  addFormats(ajv);

  const validate = ajv.compile(getSchema(version));
  validatorCache.set(version, validate);
  return validate;
}

/**
 * Validate an output document against the specified schema version
 */
export function validateOutput(version: SchemaVersion, payload: unknown): ValidationResult {
  assertValidSchemaVersion(version);

  const validate = getValidator(version);
  if (validate(payload)) {
    return { valid: true, errors: [] };
  }

  const errors: ValidationError[] = (validate.errors ?? []).map((err) => ({
    path: err.instancePath || '/',
    message: err.message ?? 'Unknown validation error',
    keyword: err.keyword,
  }));

  return { valid: false, errors };
}

export function validateOutputOrThrow(version: SchemaVersion, payload: unknown): void {
  const result = validateOutput(version, payload);
  if (!result.valid) {
    const errorMessages = result.errors
      .map((e) => `  ${e.path}: ${e.message} (${e.keyword})`)
      .join('\n');
    throw new Error(`Schema validation failed for version "${version}":\n${errorMessages}`);
  }
}

/**
 * Resolve schema version with precedence:
 * 1. CLI flag
 * 2. Environment variable: STMTSCAN_SCHEMA_VERSION
 * 3. Default
 */
export function resolveSchemaVersion(cliVersion?: string): SchemaVersion {
  if (cliVersion !== undefined && cliVersion !== '') {
    assertValidSchemaVersion(cliVersion);
    return cliVersion;
  }

  const envVersion = process.env['STMTSCAN_SCHEMA_VERSION'];
  if (envVersion !== undefined && envVersion !== '') {
    assertValidSchemaVersion(envVersion);
    return envVersion;
  }

  return DEFAULT_SCHEMA_VERSION;
}
