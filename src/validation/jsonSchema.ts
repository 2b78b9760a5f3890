import Ajv from "ajv";
import type { ValidateFunction } from "ajv";
import addFormats from "ajv-formats";
import descriptorSchema from "../../schemas/dataset-descriptor.schema.json";
import type { DescriptorDocument } from "../types/descriptor";

const ajv = new Ajv({ allErrors: true, strict: false });
addFormats(ajv);

let descriptorValidator: ValidateFunction<DescriptorDocument> | null = null;

export function getDescriptorValidator(): ValidateFunction<DescriptorDocument> {
  if (!descriptorValidator) {
    descriptorValidator = ajv.compile<DescriptorDocument>(descriptorSchema);
  }
  return descriptorValidator;
}

export function describeSchemaErrors<T>(validator: ValidateFunction<T>): string {
  return (validator.errors ?? [])
    .map((error) => `${error.instancePath || "<root>"} ${error.message ?? "is invalid"}`)
    .join("; ");
}
