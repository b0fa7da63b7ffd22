import type { TSchema, Static } from "@sinclair/typebox";
import type { TypeCheck, ValueError } from "@sinclair/typebox/compiler";
import { TypeCompiler } from "@sinclair/typebox/compiler";

type SchemaValueType<T extends TSchema> = Static<T>;
export type Validator<T extends TSchema> = TypeCheck<T> & {
  Parse: (value: unknown) => SchemaValueType<T>;
  SafeParse: (
    value: unknown,
  ) =>
    | { success: true; value: SchemaValueType<T>; error?: undefined }
    | { success: false; value?: undefined; error: ValidationError };
};

export class ValidationError extends Error {
  public readonly errors: ValueError[];

  constructor(errors: Iterable<ValueError>) {
    const errorsArray = Array.from(errors);
    const message = errorsArray.map((error) => `${error.path}: ${error.message}`).join("\n");
    super(message);
    this.name = this.constructor.name;
    this.errors = errorsArray;
  }
}

export const compileSchema = <T extends TSchema>(schema: T): Validator<T> => {
  const typeCheck = TypeCompiler.Compile(schema);

  /**
   * Checks the given value against the given schema and returns the parsed value.
   * Throws an error if the value does not match the schema.
   */
  const parse = (value: unknown): SchemaValueType<T> => {
    if (typeCheck.Check(value)) {
      return value;
    }
    throw new ValidationError(typeCheck.Errors(value));
  };

  /**
   * Checks the given value against the given schema and returns the parsed value.
   * Returns an error if the value does not match the schema.
   */
  const safeParse: Validator<T>["SafeParse"] = (value) => {
    if (typeCheck.Check(value)) {
      return { success: true, value };
    }
    return { success: false, error: new ValidationError(typeCheck.Errors(value)) };
  };

  return Object.assign(typeCheck, { Parse: parse, SafeParse: safeParse });
};
