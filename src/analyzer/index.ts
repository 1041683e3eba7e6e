import parse, { tokenize } from '../parser';
import Dataset from '../dataset/type';
import { EmptyQueryError, QueryError } from '../errors';
import { EngineOptions, resolveOptions } from '../config';
import { executeWithContext } from '../executor';
import { explain } from '../planner';
import { ExplainResult } from '../planner/type';
import detectIssues, { overallSeverity } from './issues';
import {
  generateTips, optimizeQuery, rateAccess, recommendIndexes, suggestRewrites,
} from './suggest';
import { QueryAnalysis } from './type';

export * from './type';

/**
 * Runs the query and reviews it: anti-patterns from the tokens, the access
 * paths explain would pick, index suggestions and rewrites. An execution
 * error is reported alongside the rest rather than cutting the review short.
 */
export default function analyze(sql: string, dataset: Dataset,
  options: EngineOptions = {},
): QueryAnalysis {
  let context = resolveOptions(options);
  let analysis: QueryAnalysis = {
    result: null,
    error: null,
    parsed: null,
    issues: [],
    overallSeverity: 'good',
    explain: null,
    accessRating: 'good',
    indexRecommendations: [],
    rewrites: [],
    optimizedQuery: null,
    tips: [],
  };
  if (sql.trim() === '') {
    analysis.error = new EmptyQueryError();
    return analysis;
  }
  let parsed = parse(sql);
  let tokens = tokenize(sql);
  analysis.parsed = parsed;
  let execution = executeWithContext(sql, dataset, context);
  if (execution.ok) analysis.result = execution.value;
  else analysis.error = execution.error;

  analysis.issues = detectIssues(tokens, parsed);
  analysis.overallSeverity = overallSeverity(analysis.issues);

  let plan: ExplainResult | null = null;
  if (parsed.type === 'SELECT' && parsed.tables.length > 0) {
    try {
      plan = explain(parsed, dataset, { ...options, logger: context.logger });
    } catch (e) {
      if (!(e instanceof QueryError)) throw e;
      context.logger.debug('Explain skipped', { reason: e.message });
    }
  }
  analysis.explain = plan;
  analysis.accessRating = rateAccess(plan);
  analysis.indexRecommendations = recommendIndexes(parsed, dataset);
  analysis.rewrites = suggestRewrites(sql, tokens, parsed, analysis.issues,
    dataset);
  analysis.optimizedQuery = optimizeQuery(sql, tokens);
  analysis.tips = generateTips(analysis.issues, analysis.accessRating, plan,
    analysis.result);
  return analysis;
}
