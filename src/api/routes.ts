import { Router, Request, Response } from "express";
import { calculate } from "../engine/calculator";
import { findPreconditionViolations } from "../engine/preconditions";
import { CalculationRequest } from "../models/CalculationRequest";
import {
  CalculationRequestInput,
  CalculationRequestSchema,
  toCalculationRequest,
} from "../utils/validation";

/**
 * Router options.
 *
 * @property strictByDefault - Treat every calculate request as `?strict=true`
 */
export interface RouterOptions {
  strictByDefault: boolean;
}

function isStrict(req: Request, options: RouterOptions): boolean {
  const strict = req.query.strict;
  if (strict === "true") return true;
  if (strict === "false") return false;
  return options.strictByDefault;
}

/**
 * Build the engine request, reporting model invariant failures as a message.
 */
function buildRequest(
  input: CalculationRequestInput
): { ok: true; request: CalculationRequest } | { ok: false; message: string } {
  try {
    return { ok: true, request: toCalculationRequest(input) };
  } catch (error: unknown) {
    return { ok: false, message: error instanceof Error ? error.message : String(error) };
  }
}

export function createRouter(options: RouterOptions): Router {
  const router = Router();

  /**
   * GET /api/calculate
   * Get information about the calculate endpoint
   */
  router.get("/calculate", (req: Request, res: Response) => {
    res.json({
      method: "POST",
      description: "Calculate IRR, outcome, initial investment, blended IRR or portfolio unit returns",
      endpoint: "/api/calculate",
      modes: ["irr", "outcome", "initialInvestment", "blendedIRR", "portfolioUnit", "portfolioUnitBlended"],
      note: "Rates are decimals (0.15 for 15%). Dates use YYYY-MM-DD. Add ?strict=true to reject inputs that would produce a zero fallback.",
    });
  });

  /**
   * POST /api/calculate
   * Run a calculation and return the result with its growth series
   */
  router.post("/calculate", (req: Request, res: Response) => {
    try {
      const parsed = CalculationRequestSchema.safeParse(req.body);
      if (!parsed.success) {
        return res.status(400).json({
          error: "Invalid calculation request",
          details: parsed.error.issues.map((issue) => ({
            path: issue.path.join("."),
            message: issue.message,
          })),
        });
      }

      const built = buildRequest(parsed.data);
      if (!built.ok) {
        return res.status(400).json({
          error: "Invalid calculation request",
          message: built.message,
        });
      }

      const { request } = built;
      const violations = findPreconditionViolations(request);
      if (violations.length > 0 && isStrict(req, options)) {
        return res.status(422).json({
          error: "Inputs are outside the calculation domain",
          violations,
        });
      }

      const result = calculate(request);
      res.json({ ...result, warnings: violations });
    } catch (error: unknown) {
      console.error("Error in calculation:", error);
      res.status(500).json({
        error: "Internal server error",
        message: error instanceof Error ? error.message : String(error),
      });
    }
  });

  /**
   * GET /api
   * API information endpoint
   */
  router.get("/", (req: Request, res: Response) => {
    res.json({
      message: "Investment Return Calculator API",
      version: "1.0.0",
      endpoints: {
        calculate: "POST /api/calculate - Run a return calculation and get its growth series",
        health: "GET /api/health - Health check",
      },
    });
  });

  /**
   * GET /api/health
   * Health check endpoint
   */
  router.get("/health", (req: Request, res: Response) => {
    res.json({ status: "ok", timestamp: new Date().toISOString() });
  });

  return router;
}
