import { z } from "zod";

const FiniteNumber = z.number().finite();

export const ModelArtifactSchema = z.object({
  format: z.literal("logistic-regression"),
  version: z.string().min(1).optional(),
  coefficients: z.array(FiniteNumber).min(1, "coefficients must not be empty"),
  intercept: FiniteNumber.default(0)
});

export type ModelArtifact = z.infer<typeof ModelArtifactSchema>;

/** The frozen form a handle carries; safe to share between requests and workers. */
export type LoadedArtifact = Readonly<Omit<ModelArtifact, "coefficients">> & {
  readonly coefficients: readonly number[];
};

export function describeArtifactIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const pointer = issue.path.length > 0 ? issue.path.join(".") : "root";
      return `${pointer}: ${issue.message}`;
    })
    .join("; ");
}
