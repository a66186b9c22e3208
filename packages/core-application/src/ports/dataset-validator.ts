export type ValidationOutcome =
  | { status: "valid" }
  | { status: "invalid"; details: string }
  | { status: "unavailable"; reason: string };

export interface DatasetValidator {
  validate(datasetDir: string): Promise<ValidationOutcome>;
}
