import { z } from "zod";

const serviceAccountKeySchema = z.object({
  client_email: z.string(),
  private_key: z.string(),
});

export type ServiceAccountKey = z.infer<typeof serviceAccountKeySchema>;

/** Decodes `GCP_SERVICE_ACCOUNT_KEY`, a base64-encoded service account JSON. */
export function decodeServiceAccountKey(encoded: string): ServiceAccountKey {
  try {
    const decoded = Buffer.from(encoded, "base64").toString("utf8");
    return serviceAccountKeySchema.parse(JSON.parse(decoded));
  } catch (error) {
    throw new Error(
      "GCP_SERVICE_ACCOUNT_KEY must be a base64-encoded JSON service account credential",
      { cause: error }
    );
  }
}
