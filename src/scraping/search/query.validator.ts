/**
 * Search Query Validator
 *
 * Joi schemas for search input. Runs before any network call so a bad
 * state code or date range never reaches the registry.
 */
import Joi from "joi";
import config from "../../config";
import { STATE_CODES } from "../../config/constants";
import { ValidationError } from "../../shared/errors/scrape.errors";
import type { SearchQuery } from "../../shared/types/search.types";

/** Unvalidated search input, as received from callers */
export interface SearchQueryInput {
  barNumber: string;
  stateCode: string;
  startDate?: Date;
  endDate?: Date;
  page?: number;
  pageSize?: number;
}

const searchQuerySchema = Joi.object<SearchQuery>({
  barNumber: Joi.string().trim().min(1).required(),
  stateCode: Joi.string()
    .valid(...STATE_CODES)
    .required()
    .messages({ "any.only": "stateCode must be a Brazilian state code" }),
  startDate: Joi.date(),
  endDate: Joi.date(),
  page: Joi.number().integer().min(1).default(1),
  pageSize: Joi.number().integer().min(1).default(config.pageSize),
});

const daysSchema = Joi.number().integer().min(0).required().label("days");

/**
 * Validate and normalize search input.
 * State codes are case-insensitive and come back upper-cased.
 *
 * @throws ValidationError listing every violation
 */
export function validateSearchQuery(input: SearchQueryInput): SearchQuery {
  const { error, value } = searchQuerySchema.validate(
    { ...input, stateCode: String(input.stateCode ?? "").trim().toUpperCase() },
    { abortEarly: false, stripUnknown: true }
  );

  if (error) {
    throw new ValidationError(
      `Invalid search query: ${error.message}`,
      error.details.map((detail) => detail.message)
    );
  }

  if (value.startDate && value.endDate && value.startDate.getTime() > value.endDate.getTime()) {
    throw new ValidationError("Invalid search query: startDate must not be after endDate", [
      '"startDate" must be less than or equal to "endDate"',
    ]);
  }

  return value;
}

/** @throws ValidationError unless days is a non-negative integer */
export function validateDays(days: number): number {
  const { error, value } = daysSchema.validate(days);
  if (error) {
    throw new ValidationError(`Invalid search window: ${error.message}`, [error.message]);
  }
  return value;
}
