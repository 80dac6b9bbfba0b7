import { InMemoryCityCatalog, type CityCatalog } from "../../services/catalog/city-catalog.js";
import { describeNotice } from "../../services/selection/notices.js";
import { SelectionPlanValidationError, type SelectionDefaults } from "../../services/selection/selection.plan.js";
import { selectCities } from "../../services/selection/selection.service.js";
import { CatalogSchemaError } from "../../services/selection/stages/pool.stage.js";
import type { NoticeSink, SelectionInput, SelectionResult } from "../../services/selection/types.js";
import type { SelectionErrorResponse, SelectionResponse } from "./selection.types.js";
import { SelectionBodySchema, SelectionQuerySchema, formatIssues } from "./selection.validator.js";

export interface SelectionControllerDeps {
  catalog: CityCatalog;
  defaults: SelectionDefaults;
  sink?: NoticeSink;
}

export function toSelectionResponse(result: SelectionResult): SelectionResponse {
  return {
    cities: result.cities.map((c) => ({
      id: c.id,
      name: c.name,
      lat: c.latitude,
      lng: c.longitude,
      population: c.population,
    })),
    requested: result.requested,
    selected: result.cities.length,
    poolSize: result.poolSize,
    repair: result.repair,
    warnings: result.warnings.map((w) => ({ kind: w.kind, message: describeNotice(w) })),
  };
}

/** Run the pipeline, mapping domain failures to 400/422 bodies. Anything else propagates. */
async function run(
  input: SelectionInput,
  catalog: CityCatalog,
  deps: SelectionControllerDeps
): Promise<SelectionResponse | SelectionErrorResponse> {
  try {
    const result = await selectCities(input, { catalog, sink: deps.sink, defaults: deps.defaults });
    return toSelectionResponse(result);
  } catch (err) {
    if (err instanceof SelectionPlanValidationError) {
      return { error: err.message, status: 400, code: err.code };
    }
    if (err instanceof CatalogSchemaError) {
      return { error: err.message, status: 422, code: err.code };
    }
    throw err;
  }
}

/** GET /selection: options from the query string, rows from the configured catalog. */
export async function selectFromCatalog(
  queryParams: unknown,
  deps: SelectionControllerDeps
): Promise<SelectionResponse | SelectionErrorResponse> {
  const query = SelectionQuerySchema.safeParse(queryParams);
  if (!query.success) {
    return { error: `Invalid query parameters: ${formatIssues(query.error)}`, status: 400 };
  }
  return run(query.data, deps.catalog, deps);
}

/** POST /selection: options and rows from the request body. */
export async function selectFromBody(
  body: unknown,
  deps: SelectionControllerDeps
): Promise<SelectionResponse | SelectionErrorResponse> {
  const parsed = SelectionBodySchema.safeParse(body);
  if (!parsed.success) {
    return { error: `Invalid request body: ${formatIssues(parsed.error)}`, status: 400 };
  }
  const { cities, ...options } = parsed.data;
  return run(options, new InMemoryCityCatalog(cities), deps);
}
