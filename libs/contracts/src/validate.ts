import Ajv2020, { type ErrorObject, type ValidateFunction } from "ajv/dist/2020";
import addFormats from "ajv-formats";

// Schemas
import cloudtrailRecord from "../schemas/cloudtrail.record.v1.json";
import weeklyArchive from "../schemas/weekly.archive.v1.json";

const ajv = new Ajv2020({ allErrors: true, strict: false });
addFormats(ajv);

// Compile validators once (cold start cost only)
const validators = {
  "cloudtrail.record.v1": ajv.compile(cloudtrailRecord),
  "weekly.archive.v1": ajv.compile(weeklyArchive),
} satisfies Record<string, ValidateFunction>;

export type SchemaName = keyof typeof validators;

export class SchemaValidationError extends Error {
  constructor(
    readonly schemaName: SchemaName,
    readonly details: ErrorObject[],
  ) {
    const messages = details.map(e => `${e.instancePath || '/'} ${e.message}`).join("; ");
    super(`Schema validation failed for ${schemaName}: ${messages}`);
    this.name = "SchemaValidationError";
  }
}

export function validate<T>(schemaName: SchemaName, data: unknown): asserts data is T {
  const v = validators[schemaName];
  if (!v(data)) {
    throw new SchemaValidationError(schemaName, v.errors ?? []);
  }
}
