/**
 * Domain validation for re-contract estimate requests.
 *
 * Runs before any database access. Reference checks (plan, customer) need the
 * database and live in the repository transaction.
 */

import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import { isQuoteEffectiveDays } from '../../../common/types/enums.js';
import { addDays, isIsoDate } from '../../../common/utils/dates.js';
import { createValidationError } from './errors.js';
import {
  DESIRED_QUOTE_WINDOW_DAYS,
  MAX_PLANTS,
  MAX_REMARKS_LENGTH,
  MAX_SUPPLY_POINTS,
  MAX_SUPPLY_POINT_NUMBER_LENGTH,
  MIN_SUPPLY_POINTS,
  type CreateRecontractEstimateInput,
  type NewRecontractEstimate,
  type RecontractPlantInput,
} from './types.js';

import type { ValidationError } from '../../../common/types/errors.js';

/** Always stored ahead of the user-supplied scenarios */
export const IMPLICIT_PLANT: RecontractPlantInput = { capacityMw: 0, ppaUnitPriceYenPerKwh: null };

/**
 * Capacity is stored with one decimal place.
 */
export const roundCapacity = (capacityMw: number): number =>
  new Decimal(capacityMw).toDecimalPlaces(1, Decimal.ROUND_HALF_UP).toNumber();

/** Length in code points, as VARCHAR(n) counts it */
const charCount = (value: string): number => [...value].length;

const validatePlant = (
  plant: RecontractPlantInput,
  index: number
): Result<RecontractPlantInput, ValidationError> => {
  if (!Number.isFinite(plant.capacityMw) || plant.capacityMw < 0) {
    return err(
      createValidationError(
        `plants[${String(index)}].capacity_mw must be a number >= 0`,
        'capacity_mw',
        plant.capacityMw
      )
    );
  }
  const price = plant.ppaUnitPriceYenPerKwh;
  if (price !== null && (!Number.isFinite(price) || price < 0)) {
    return err(
      createValidationError(
        `plants[${String(index)}].ppa_unit_price_yen_per_kwh must be a number >= 0`,
        'ppa_unit_price_yen_per_kwh',
        price
      )
    );
  }
  return ok({ capacityMw: roundCapacity(plant.capacityMw), ppaUnitPriceYenPerKwh: price });
};

/**
 * Checks an estimate request against the domain rules and returns it in the
 * shape the repository persists.
 *
 * @param today - Server-local date, 'YYYY-MM-DD'
 */
export const validateRecontractEstimate = (
  input: CreateRecontractEstimateInput,
  today: string
): Result<NewRecontractEstimate, ValidationError> => {
  const quoteEffectiveDays = input.quoteEffectiveDays;
  if (!isQuoteEffectiveDays(quoteEffectiveDays)) {
    return err(
      createValidationError(
        'quote_effective_days must be 30 or 60',
        'quote_effective_days',
        quoteEffectiveDays
      )
    );
  }

  const latest = addDays(today, DESIRED_QUOTE_WINDOW_DAYS);
  if (
    !isIsoDate(input.desiredQuoteDate) ||
    latest === null ||
    input.desiredQuoteDate < today ||
    input.desiredQuoteDate > latest
  ) {
    return err(
      createValidationError(
        `desired_quote_date must be between ${today} and ${latest ?? today}`,
        'desired_quote_date',
        input.desiredQuoteDate
      )
    );
  }

  if (input.remarks !== null && charCount(input.remarks) > MAX_REMARKS_LENGTH) {
    return err(
      createValidationError(
        `remarks must be at most ${String(MAX_REMARKS_LENGTH)} characters`,
        'remarks'
      )
    );
  }

  const supplyPointNumbers = input.supplyPointNumbers.map((spn) => spn.trim());
  if (
    supplyPointNumbers.length < MIN_SUPPLY_POINTS ||
    supplyPointNumbers.length > MAX_SUPPLY_POINTS
  ) {
    return err(
      createValidationError(
        `supply_points must contain between ${String(MIN_SUPPLY_POINTS)} and ${String(MAX_SUPPLY_POINTS)} entries`,
        'supply_points',
        supplyPointNumbers.length
      )
    );
  }
  const badIndex = supplyPointNumbers.findIndex(
    (spn) => spn.length === 0 || charCount(spn) > MAX_SUPPLY_POINT_NUMBER_LENGTH
  );
  if (badIndex !== -1) {
    return err(
      createValidationError(
        `supply_points[${String(badIndex)}].supply_point_number must be 1-${String(MAX_SUPPLY_POINT_NUMBER_LENGTH)} characters`,
        'supply_point_number',
        input.supplyPointNumbers[badIndex]
      )
    );
  }

  if (input.plants.length > MAX_PLANTS) {
    return err(
      createValidationError(
        `plants must contain at most ${String(MAX_PLANTS)} entries`,
        'plants',
        input.plants.length
      )
    );
  }

  const plants: RecontractPlantInput[] = [IMPLICIT_PLANT];
  for (const [index, plant] of input.plants.entries()) {
    const validated = validatePlant(plant, index);
    if (validated.isErr()) {
      return err(validated.error);
    }
    plants.push(validated.value);
  }

  return ok({
    planId: input.planId,
    customerId: input.customerId,
    desiredQuoteDate: input.desiredQuoteDate,
    quoteEffectiveDays,
    remarks: input.remarks,
    supplyPointNumbers,
    plants,
  });
};
