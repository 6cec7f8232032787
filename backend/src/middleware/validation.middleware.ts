import { body, type ValidationChain } from 'express-validator';

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

const dateField = (field: string): ValidationChain =>
  body(field)
    .isString().withMessage(`${field} must be a date string`)
    .bail()
    .matches(DATE_PATTERN).withMessage(`${field} must use the YYYY-MM-DD format`)
    .bail()
    .isISO8601({ strict: true }).withMessage(`${field} must be a valid calendar date`);

// end_date >= start_date is left to the caller, as is the 1-3 range of budget_level
export const tripRequestValidation: ValidationChain[] = [
  body('source').isString().withMessage('source must be a string'),
  body('destination').isString().withMessage('destination must be a string'),
  dateField('start_date'),
  dateField('end_date'),
  body('budget_level')
    .not().isArray().withMessage('budget_level must be an integer')
    .bail()
    .isInt().withMessage('budget_level must be an integer')
    .toInt()
];
