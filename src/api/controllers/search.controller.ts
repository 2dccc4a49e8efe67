/**
 * Search Controller
 *
 * Ad-hoc publication search for a bar registration, outside the
 * monitor cycle. Nothing is persisted or notified.
 */
import type { NextFunction, Request, Response } from "express";
import Joi from "joi";
import { SEARCH_DEFAULTS } from "../../config/constants";
import type { SearchService } from "../../scraping/search/search.service";
import { ValidationError } from "../../shared/errors/scrape.errors";
import type { SearchMode } from "../../shared/types/search.types";

export type AdHocSearcher = Pick<SearchService, "searchByPeriod" | "searchLastDays">;

interface SearchRequestBody {
  barNumber: string;
  stateCode: string;
  days?: number;
  startDate?: Date;
  endDate?: Date;
  mode: SearchMode;
}

const searchBodySchema = Joi.object<SearchRequestBody>({
  barNumber: Joi.string().trim().min(1).required(),
  stateCode: Joi.string().trim().required(),
  days: Joi.number().integer().min(0),
  startDate: Joi.date(),
  endDate: Joi.date(),
  mode: Joi.string().valid("sequential", "concurrent").default("concurrent"),
})
  .oxor("days", "startDate")
  .oxor("days", "endDate");

export function createSearchController(searcher: AdHocSearcher) {
  /**
   * POST /api/monitor/v1/search
   *
   * Body: { barNumber, stateCode, days? | startDate?/endDate?, mode? }.
   * Without days or dates, searches the last 7 days.
   */
  async function search(req: Request, res: Response, next: NextFunction): Promise<void> {
    const { error, value } = searchBodySchema.validate(req.body, { abortEarly: false });
    if (error) {
      next(new ValidationError("Invalid search request", error.details.map((d) => d.message)));
      return;
    }

    try {
      const { barNumber, stateCode, days, startDate, endDate, mode } = value;
      const result =
        days === undefined && (startDate || endDate)
          ? await searcher.searchByPeriod(barNumber, stateCode, startDate, endDate, { mode })
          : await searcher.searchLastDays(barNumber, stateCode, days ?? SEARCH_DEFAULTS.DAYS, { mode });
      res.json(result);
    } catch (err) {
      next(err);
    }
  }

  return { search };
}

export type SearchController = ReturnType<typeof createSearchController>;
