import { z } from "zod";
import { MAX_EXCHANGE_ROUNDS } from "./types-protocol.js";

const uValue = z.number().min(0).max(1);

/**
 * Zod schema for experiment configuration (file or STAG_* environment).
 */
export const ExperimentConfigSchema = z
  .object({
    /** Exchange rounds per trial (0 = straight from beliefs to decisions) */
    rounds: z.number().int().min(0).max(MAX_EXCHANGE_ROUNDS).optional(),

    /**
     * Belief an agent brings into an exchange turn: its most recent one
     * ("latest") or its initial one ("initial").
     */
    exchangeBelief: z.enum(["latest", "initial"]).optional(),

    /** Final round: both agents reply ("both") or agent 2 only ("agent2") */
    finalReply: z.enum(["both", "agent2"]).optional(),

    /** Probability that any collaboration fails for technical reasons */
    techFailureRate: z.number().min(0).max(1).optional(),

    /** Extra oracle attempts per step after a malformed reply */
    oracleRetries: z.number().int().min(0).max(5).optional(),

    /** Number of trials for `run` */
    trials: z.number().int().min(1).optional(),

    /** Trials in flight at once */
    concurrency: z.number().int().min(1).max(32).optional(),

    resultsFile: z.string().min(1).optional(),

    /** JSON-lines file for `single` results */
    singleResultsFile: z.string().min(1).optional(),

    /** Decimals for aggregation grouping keys; null = exact float match */
    keyDecimals: z.number().int().min(0).max(10).nullable().optional(),

    /** u-values for the symmetric sweep */
    uValues: z.array(uValue).min(1).optional(),

    /** [agent1, agent2] u-value pairs for the asymmetric sweep */
    uValuePairs: z.array(z.tuple([uValue, uValue])).min(1).optional(),

    gatewayUrl: z.string().url().optional(),
    gatewayToken: z.string().min(1).optional(),
    model: z.string().min(1).optional(),
    timeoutMs: z.number().int().min(1000).optional(),

    /** Optional Supabase mirror: both URL and key, or neither */
    supabaseUrl: z.string().url().optional(),
    supabaseKey: z.string().min(1).optional(),
    supabaseTable: z.string().min(1).optional(),
  })
  .strict()
  .refine((c) => (c.supabaseUrl === undefined) === (c.supabaseKey === undefined), {
    message: "supabaseUrl and supabaseKey must be set together",
    path: ["supabaseKey"],
  });

export type ExperimentConfigInput = z.infer<typeof ExperimentConfigSchema>;
