import { REGISTRY } from "../../config/constants";
import type { RequestParams, SearchQuery } from "../../shared/types/search.types";
import { formatRegistryDate } from "../../shared/utils/date";

/**
 * Query-string for one results page, using the registry's own field names.
 * Date bounds are only sent when set.
 */
export function buildRequestParams(query: SearchQuery): RequestParams {
  const { PARAMS } = REGISTRY;
  const params: RequestParams = {
    [PARAMS.BAR_NUMBER]: query.barNumber,
    [PARAMS.STATE_CODE]: query.stateCode,
    [PARAMS.PAGE]: String(query.page),
    [PARAMS.PAGE_SIZE]: String(query.pageSize),
  };

  if (query.startDate) {
    params[PARAMS.START_DATE] = formatRegistryDate(query.startDate);
  }
  if (query.endDate) {
    params[PARAMS.END_DATE] = formatRegistryDate(query.endDate);
  }

  return params;
}
