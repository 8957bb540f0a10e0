import { Ajv, type ErrorObject, type SchemaObject, type ValidateFunction } from "ajv";

const ajv = new Ajv({ allErrors: true, strict: false });

export function buildValidator<T>(schema: SchemaObject): ValidateFunction<T> {
  return ajv.compile<T>(schema);
}

export function formatValidationErrors(errors: ErrorObject[] | null | undefined): string {
  if (!errors || errors.length === 0) {
    return "Invalid arguments.";
  }

  return errors
    .map((error) => {
      const pathPrefix = error.instancePath ? `${error.instancePath} ` : "";
      return `${pathPrefix}${error.message ?? "is invalid"}`.trim();
    })
    .join("; ");
}
