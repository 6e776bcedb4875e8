import { Router, Request, Response, NextFunction } from 'express';
import Joi from 'joi';
import { SalesController, salesController } from '@/controllers/salesController';

const listParam = Joi.alternatives(Joi.string().allow(''), Joi.array().items(Joi.string().allow('')));

const querySchema = Joi.object({
  years: Joi.alternatives(
    Joi.string().allow('').pattern(/^\s*(\d{4}\s*(,\s*\d{4}\s*)*)?$/),
    Joi.array().items(Joi.string().pattern(/^\s*\d{4}\s*$/))
  ).optional(),
  months: listParam.optional(),
  productCodes: listParam.optional(),
  customerClasses: listParam.optional(),
  fileName: Joi.string().max(200).pattern(/^[^\\/]+$/).optional()
}).unknown(true);

export function validateQuery(req: Request, res: Response, next: NextFunction) {
  const { error } = querySchema.validate(req.query, { abortEarly: false });
  if (error) {
    res.status(400).json({ success: false, error: { code: 'INVALID_QUERY', message: 'Invalid query parameters', details: error.details.map(d => d.message) } });
    return;
  }
  next();
}

export function createSalesRouter(controller: SalesController = salesController): Router {
  const router = Router();

  /**
   * @route GET /api/v1/sales/filter-options
   * @desc Get the distinct years, months, product codes and customer classes
   * @access Public
   */
  router.get('/filter-options', controller.getFilterOptions.bind(controller));

  /**
   * @route GET /api/v1/sales/report
   * @desc Get the filtered monthly aggregate with summary, product rollup and chart series
   * @access Public
   */
  router.get('/report', validateQuery, controller.getReport.bind(controller));

  /**
   * @route GET /api/v1/sales/export
   * @desc Download the filtered monthly aggregate as CSV
   * @access Public
   */
  router.get('/export', validateQuery, controller.exportCSV.bind(controller));

  /**
   * @route GET /api/v1/sales/data-health
   * @desc Get row counts and loader metadata
   * @access Public
   */
  router.get('/data-health', controller.getDataHealth.bind(controller));

  return router;
}
