import { error } from "./definers/builders/error";
import type { DefaultErrorType } from "./types/error";

// No serializer registered for a resolved type
export const noSerializerError = error<
  { type: string; field?: string } & DefaultErrorType
>("mapper.errors.noSerializer")
  .format(({ type, field }) =>
    field === undefined
      ? `No TypeSerializer found for type ${type}`
      : `No TypeSerializer found for field ${field} of type ${type}`,
  )
  .remediation(
    ({ type }) =>
      `Register a serializer for ${type} on the collection passed to ConfigurationOptions.withSerializers().`,
  )
  .build();

// Reading or writing a record field failed
export const fieldAccessError = error<
  { field: string; operation: "serialize" | "deserialize" } & DefaultErrorType
>("mapper.errors.fieldAccess")
  .format(({ field, operation }) => `Unable to ${operation} field ${field}`)
  .build();

// Mapper requested for a type that was not declared with serializable()
export const notMappableTypeError = error<{ type: string } & DefaultErrorType>(
  "mapper.errors.notMappableType",
)
  .format(({ type }) => `Type ${type} is not a serializable structured type`)
  .remediation(
    "Declare the type with serializable(...).build() before asking for its mapper.",
  )
  .build();

// Mapper requested for an abstract or interface type
export const abstractTypeError = error<{ type: string } & DefaultErrorType>(
  "mapper.errors.abstractType",
)
  .format(
    ({ type }) =>
      `ObjectMapper can only work with concrete types, but ${type} is abstract`,
  )
  .build();

// bindToNew() on a type declared without a factory
export const noFactoryError = error<{ type: string } & DefaultErrorType>(
  "mapper.errors.noFactory",
)
  .format(
    ({ type }) =>
      `No zero-arg factory is available for ${type} but one is required to construct new instances!`,
  )
  .remediation("Declare one with .factory(() => new YourClass()).")
  .build();

// The factory itself threw
export const constructionError = error<{ type: string } & DefaultErrorType>(
  "mapper.errors.construction",
)
  .format(({ type }) => `Unable to create instance of target type ${type}`)
  .build();

// A required scalar is missing
export const valueAbsentError = error<{ path: string } & DefaultErrorType>(
  "mapper.errors.valueAbsent",
)
  .format(({ path }) => `No value present in node ${path}`)
  .build();

// Scalar present but not convertible to the declared kind
export const invalidValueError = error<
  { path: string; type: string; value: string } & DefaultErrorType
>("mapper.errors.invalidValue")
  .format(
    ({ path, type, value }) =>
      `Invalid value provided for ${path}: expected a value of type ${type}, got ${value}`,
  )
  .build();

export const invalidEnumConstantError = error<
  { path: string; type: string; value: string } & DefaultErrorType
>("mapper.errors.invalidEnumConstant")
  .format(
    ({ path, type, value }) =>
      `Invalid enum constant provided for ${path}: Expected a value of enum ${type}, got ${value}`,
  )
  .build();

// UUID/URI/URL/Pattern text that does not parse; the parse failure is the cause
export const malformedLiteralError = error<
  {
    kind: "UUID" | "URI" | "URL" | "Pattern";
    path: string;
    value: string;
  } & DefaultErrorType
>("mapper.errors.malformedLiteral")
  .format(
    ({ kind, path, value }) =>
      `Invalid ${kind} string provided for ${path}: got ${value}`,
  )
  .build();

export const missingDiscriminatorError = error<
  { type: string } & DefaultErrorType
>("mapper.errors.missingDiscriminator")
  .format(({ type }) => `No available configured type for instances of ${type}`)
  .build();

export const unknownClassError = error<
  { name: string; type: string } & DefaultErrorType
>("mapper.errors.unknownClass")
  .format(
    ({ name, type }) =>
      `Unknown class of object ${name}: it is not a registered variant of ${type}`,
  )
  .remediation(
    ({ type }) =>
      `Declare the class with serializable(...).extends(${type}) or .implements(${type}).`,
  )
  .build();

// A value's runtime class has no serializable() declaration
export const unmappedRuntimeTypeError = error<
  { className: string } & DefaultErrorType
>("mapper.errors.unmappedRuntimeType")
  .format(
    ({ className }) =>
      `No serializable type is declared for runtime class ${className}`,
  )
  .build();

export const duplicateVariantError = error<
  { name: string; type: string } & DefaultErrorType
>("mapper.errors.duplicateVariant")
  .format(
    ({ name, type }) =>
      `A variant named "${name}" is already registered for ${type}`,
  )
  .build();

export const typeArityError = error<
  { type: string; expected: number; actual: number } & DefaultErrorType
>("mapper.errors.typeArity")
  .format(
    ({ type, expected, actual }) =>
      `Type ${type} takes ${expected} type parameter(s), got ${actual}`,
  )
  .build();

// setValue() called with something a node cannot hold
export const invalidNodeValueError = error<
  { path: string; value: string } & DefaultErrorType
>("mapper.errors.invalidNodeValue")
  .format(
    ({ path, value }) => `Node ${path} cannot hold a value of kind ${value}`,
  )
  .build();

// Map key serializer did not produce a scalar
export const invalidMapKeyError = error<
  { path: string; type: string } & DefaultErrorType
>("mapper.errors.invalidMapKey")
  .format(
    ({ path, type }) =>
      `Key of type ${type} under ${path} did not serialize to a scalar`,
  )
  .build();

export const invalidOptionsError = error<
  { issues: string[] } & DefaultErrorType
>("mapper.errors.invalidOptions")
  .format(
    ({ issues }) => `Invalid configuration options:\n  • ${issues.join("\n  • ")}`,
  )
  .build();
