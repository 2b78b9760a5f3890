import type { ExtractionInput, ExtractionProblem, ExtractionStrategy } from "./strategy";
import type { Descriptor } from "../types/descriptor";
import type { Outcome } from "../types/failure";
import { errorMessage, fail } from "../types/failure";
import type { Result } from "../types/result";
import { ok } from "../types/result";

export interface CatalogStamp {
  registryInstance: string;
  ingestedAt: string;
}

/**
 * Runs the strategy once. Any failure, including a thrown error, becomes an
 * `ExtractionError`, and the Catalog may then hold a partial record.
 */
export async function invokeStrategy(
  strategy: ExtractionStrategy,
  input: ExtractionInput,
  stamp: CatalogStamp
): Promise<Outcome<Descriptor>> {
  let outcome: Result<Descriptor, ExtractionProblem>;
  try {
    outcome = await strategy.extract({ ...input, descriptor: structuredClone(input.descriptor) });
  } catch (error) {
    return fail(
      "ExtractionError",
      `Extraction spec ${strategy.spec} threw; partial Catalog import may have occurred: ${errorMessage(error)}`
    );
  }
  if (!outcome.ok) {
    return fail("ExtractionError", `Extraction spec ${strategy.spec} failed: ${outcome.error.message}`);
  }

  const descriptor = outcome.value;
  const datasetId = descriptor.catalog.dataset_id;
  if (!datasetId) {
    return fail("ExtractionError", `Extraction spec ${strategy.spec} did not return a Catalog dataset id`);
  }

  return ok({
    ...descriptor,
    file_manifest: descriptor.file_manifest ?? input.manifest,
    catalog: {
      ...descriptor.catalog,
      dataset_id: datasetId,
      registry_instance: stamp.registryInstance,
      date_ingested: stamp.ingestedAt,
      extractor_used: strategy.spec
    }
  });
}
