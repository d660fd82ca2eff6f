import { Logger } from 'pino';
import { AnalyticsLog } from '../analytics';
import { AskResult, FailureInput, Joke, JokeSearchBackend, ResponseType, SearchHit } from '../types';
import { CatalogEmptyError, errorMessage } from '../errors';
import { JokeCatalog } from './joke-catalog';
import { LanguageModel } from './llm-client';
import {
  buildSelectionPrompt,
  buildTopicPrompt,
  extractTopicFallback,
  isCountingQuestion,
  isExistenceQuestion,
  isNsfwRequest,
  normalizeTopic,
  parseSelection,
  plural
} from './prompts';

export interface ChatServiceOptions {
  catalog: JokeCatalog;
  search: JokeSearchBackend;
  model: LanguageModel;
  analytics: AnalyticsLog;
  logger: Logger;
  now?: () => number;
}

interface Outcome {
  response: string;
  jokes: Joke[];
  responseType: ResponseType;
  error?: string;
}

interface RequestContext {
  message: string;
  queryId: number;
  startedAt: number;
}

export const MESSAGES = {
  nsfw: 'I cannot provide NSFW or inappropriate content. All jokes in my collection are filtered to exclude such content.',
  found: "Here's what I found for you:",
  noMatch: "I couldn't find any jokes matching your request.",
  noPerfectMatch: "I couldn't find a joke that matches your request perfectly. Would you like a random joke instead?",
  existenceNone: "No, I don't have any jokes matching that description in my collection.",
  searchTrouble: "I'm having trouble searching the joke collection. Please try again.",
  fallbackRandom: "I'm having trouble processing your request. Here's a random joke instead:"
} as const;

const SEARCH_LIMIT = 5;
const EXISTENCE_SEARCH_LIMIT = 10;
const EXISTENCE_MATCH_LIMIT = 5;
const EXAMPLE_LIMIT = 3;

/**
 * Answers free-text joke requests and records one query event per request,
 * plus a failure event for every backend error it recovers from.
 */
export class ChatService {
  private readonly catalog: JokeCatalog;
  private readonly search: JokeSearchBackend;
  private readonly model: LanguageModel;
  private readonly analytics: AnalyticsLog;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(options: ChatServiceOptions) {
    this.catalog = options.catalog;
    this.search = options.search;
    this.model = options.model;
    this.analytics = options.analytics;
    this.logger = options.logger.child({ component: 'ChatService' });
    this.now = options.now ?? Date.now;
  }

  async ask(message: string): Promise<AskResult> {
    const context: RequestContext = {
      message,
      queryId: this.analytics.nextQueryId(),
      startedAt: this.now()
    };

    if (isNsfwRequest(message)) {
      return this.finish(context, { response: MESSAGES.nsfw, jokes: [], responseType: 'nsfw_blocked' });
    }

    if (this.catalog.count() === 0) {
      throw new CatalogEmptyError();
    }

    try {
      if (isCountingQuestion(message)) {
        return await this.answerCount(context);
      }
      if (isExistenceQuestion(message)) {
        return await this.answerExistence(context);
      }
      return await this.answerRequest(context);
    } catch (error) {
      this.logger.error({ error: errorMessage(error), queryId: context.queryId }, 'Unexpected error answering request');
      await this.recordQuery(context, { response: '', jokes: [], responseType: 'error', error: errorMessage(error) });
      throw error;
    }
  }

  private async answerCount(context: RequestContext): Promise<AskResult> {
    let topic: string;
    try {
      topic = normalizeTopic(await this.model.complete(buildTopicPrompt(context.message))) || 'unknown';
    } catch (error) {
      topic = extractTopicFallback(context.message);
      this.logger.warn({ error: errorMessage(error), topic }, 'Topic extraction failed, using keyword fallback');
      await this.recordFailure({
        source: 'llm',
        error_type: 'llm_topic_error',
        error_message: errorMessage(error),
        fallback_used: 'keyword_extraction'
      });
    }

    const matches = this.catalog.matchingTopic(topic);
    return this.finish(context, {
      response: `I have ${plural(matches.length, `${topic} joke`)} in my collection.`,
      jokes: matches.slice(0, EXAMPLE_LIMIT),
      responseType: matches.length > 0 ? 'success' : 'no_results'
    });
  }

  private async answerExistence(context: RequestContext): Promise<AskResult> {
    let hits: SearchHit[];
    try {
      hits = await this.search.search(context.message, EXISTENCE_SEARCH_LIMIT);
    } catch (error) {
      this.logger.error({ error: errorMessage(error) }, 'Joke search failed');
      await this.recordFailure({
        source: 'search_backend',
        error_type: 'search_error',
        error_message: errorMessage(error)
      });
      return this.finish(context, {
        response: MESSAGES.searchTrouble,
        jokes: [],
        responseType: 'error',
        error: errorMessage(error)
      });
    }

    const matching = hits.slice(0, EXISTENCE_MATCH_LIMIT).map(hit => hit.joke);
    if (matching.length === 0) {
      return this.finish(context, { response: MESSAGES.existenceNone, jokes: [], responseType: 'no_results' });
    }

    return this.finish(context, {
      response: `Yes, I found ${plural(matching.length, 'joke')} matching your query. Here are some examples:`,
      jokes: matching.slice(0, EXAMPLE_LIMIT),
      responseType: 'success'
    });
  }

  private async answerRequest(context: RequestContext): Promise<AskResult> {
    let hits: SearchHit[];
    try {
      hits = await this.search.search(context.message, SEARCH_LIMIT);
    } catch (error) {
      return this.answerWithRandomJoke(context, error);
    }

    if (hits.length === 0) {
      return this.finish(context, { response: MESSAGES.noMatch, jokes: [], responseType: 'no_results' });
    }

    let selection: number[] | 'none';
    try {
      const answer = await this.model.complete(
        buildSelectionPrompt(context.message, hits.map(hit => hit.text))
      );
      selection = parseSelection(answer, hits.length);
    } catch (error) {
      this.logger.warn({ error: errorMessage(error) }, 'Joke selection failed, using search results directly');
      await this.recordFailure({
        source: 'llm',
        error_type: 'llm_selection_error',
        error_message: errorMessage(error),
        fallback_used: 'search_direct'
      });
      return this.finish(context, {
        response: MESSAGES.found,
        jokes: hits.slice(0, EXAMPLE_LIMIT).map(hit => hit.joke),
        responseType: 'success'
      });
    }

    if (selection === 'none') {
      return this.finish(context, { response: MESSAGES.noPerfectMatch, jokes: [], responseType: 'no_results' });
    }

    const selected = selection.length > 0
      ? selection.map(index => hits[index].joke)
      : [hits[0].joke];

    return this.finish(context, { response: MESSAGES.found, jokes: selected, responseType: 'success' });
  }

  private async answerWithRandomJoke(context: RequestContext, error: unknown): Promise<AskResult> {
    this.logger.error({ error: errorMessage(error) }, 'Joke search failed, answering with a random joke');
    await this.recordFailure({
      source: 'search_backend',
      error_type: 'search_error',
      error_message: errorMessage(error),
      fallback_used: 'random_joke'
    });

    const joke = this.catalog.random();
    return this.finish(context, {
      response: MESSAGES.fallbackRandom,
      jokes: joke ? [joke] : [],
      responseType: 'error',
      error: errorMessage(error)
    });
  }

  private async finish(context: RequestContext, outcome: Outcome): Promise<AskResult> {
    await this.recordQuery(context, outcome);
    return {
      response: outcome.response,
      jokes: outcome.jokes,
      query_id: context.queryId
    };
  }

  private async recordQuery(context: RequestContext, outcome: Outcome): Promise<void> {
    await this.analytics.tryRecord(() => this.analytics.logQuery({
      query_id: context.queryId,
      user_message: context.message,
      response_type: outcome.responseType,
      jokes_count: outcome.jokes.length,
      response_time_ms: this.now() - context.startedAt,
      ...(outcome.error !== undefined && { error: outcome.error })
    }));
  }

  private async recordFailure(input: FailureInput): Promise<void> {
    await this.analytics.tryRecord(() => this.analytics.logFailure(input));
  }
}
