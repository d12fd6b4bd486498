import { Validator, type Schema } from "jsonschema";
import fs from "fs/promises";
import path from "path";
import type { SchemaDocument } from "@docsynth/core";
import { fileURLToPath } from "url";

export type SchemaValidationResult = {
  valid: boolean;
  errors?: {
    keyword?: string;
    dataPath?: string;
    schemaPath?: string;
    message?: string;
  }[];
};

export class SchemaValidator {
  private validator = new Validator();

  constructor(private readonly schema: Schema) {}

  static defaultSchemaPath(): string {
    // docsynth.schema.json sits next to src/ and dist/
    const __filename = fileURLToPath(import.meta.url);
    const __dirname = path.dirname(__filename);
    return path.join(__dirname, "..", "docsynth.schema.json");
  }

  static async load(
    schemaPath: string = SchemaValidator.defaultSchemaPath(),
  ): Promise<SchemaValidator> {
    const schemaContent = await fs.readFile(schemaPath, "utf-8");
    return new SchemaValidator(JSON.parse(schemaContent));
  }

  validate(schemaDocument: SchemaDocument): SchemaValidationResult {
    const result = this.validator.validate(schemaDocument, this.schema);

    if (!result.valid) {
      return {
        valid: false,
        errors: result.errors.map(error => ({
          keyword: error.name,
          dataPath: error.property,
          schemaPath: error.path.map(String).join("."),
          message: error.message,
        })),
      };
    }

    return { valid: true };
  }
}
