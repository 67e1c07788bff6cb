import type Bottleneck from 'bottleneck';
import pino, { type Logger } from 'pino';

import { parseTradingParams, type TradingParams } from '../config/params.js';
import { CapacityError, InputValidationError, StateError, isTradingError } from '../domain/errors.js';
import type { ClosedPositionSummary, EntryCandidate, ExitReason, OpenPosition } from '../domain/models.js';
import { entryCandidateSchema, normalizeTicker } from '../domain/models.js';
import type { EventBus } from '../events/eventBus.js';
import type { PositionLedger } from '../ledger/positionLedger.js';
import { evaluateExit, initialStop, targetFor, trailingStopUpdate } from '../policy/stopPolicy.js';
import { computeShareCount } from '../risk/positionSizing.js';

import { portfolioQueue } from './portfolioQueue.js';

export type EnterPositionInput = {
  ticker: string;
  entryPrice: number;
  portfolioValue: number;
  stopPercent?: number;
  signalSource?: string;
  notes?: string;
};

export type TickOutcome =
  | { status: 'IGNORED'; ticker: string }
  | { status: 'INVALID_PRICE'; ticker: string; price: number }
  | { status: 'HELD'; position: OpenPosition; stopAdjusted: boolean }
  | { status: 'CLOSED'; summary: ClosedPositionSummary; stopAdjusted: boolean };

export type CandidateBatchResult = {
  entered: Array<{ ticker: string; positionId: string }>;
  skipped: Array<{ ticker: string; code: string; reason: string }>;
};

export type CoordinatorOptions = {
  ledger: PositionLedger;
  eventBus: EventBus;
  params?: Partial<TradingParams>;
  logger?: Logger;
  now?: () => number;
  queues?: Bottleneck.Group;
};

/**
 * Owns the OPEN → CLOSED(STOP | TARGET | MANUAL) lifecycle. Every operation
 * for a portfolio runs alone, so the capacity checks and the ledger write
 * that follows them see the same state.
 */
export class TradeExecutionCoordinator {
  private readonly ledger: PositionLedger;
  private readonly eventBus: EventBus;
  private readonly params: TradingParams;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly queue: Bottleneck;

  constructor(options: CoordinatorOptions) {
    this.ledger = options.ledger;
    this.eventBus = options.eventBus;
    this.params = parseTradingParams(options.params);
    this.logger = options.logger ?? pino({ name: 'coordinator' });
    this.now = options.now ?? Date.now;
    this.queue = portfolioQueue(options.ledger.portfolioId, options.queues);
  }

  async enterPosition(input: EnterPositionInput): Promise<string> {
    const ticker = normalizeTicker(input.ticker);

    return this.serialize(async () => {
      try {
        const open = await this.ledger.listOpen();

        if (open.length >= this.params.maxOpenPositions) {
          throw new CapacityError('MaxPositionsReached', `max open positions reached (${this.params.maxOpenPositions})`, {
            openCount: open.length
          });
        }

        if (open.some((position) => position.ticker === ticker)) {
          throw new CapacityError('DuplicateTicker', `An open position already exists for ${ticker}`, { ticker });
        }

        const stopPrice = initialStop(input.entryPrice, input.stopPercent ?? this.params.defaultStopPercent);
        const targetPrice = targetFor(input.entryPrice, this.params.targetPercent);
        const shareCount = computeShareCount(
          input.portfolioValue,
          input.entryPrice,
          stopPrice,
          this.params.maxRiskFraction,
          this.params.maxPositionFraction
        );

        const positionId = await this.ledger.open({
          ticker,
          entryPrice: input.entryPrice,
          shareCount,
          stopPrice,
          targetPrice,
          signalSource: input.signalSource,
          notes: input.notes
        });

        const position = await this.ledger.get(positionId);
        if (!position || position.status !== 'OPEN') {
          throw new StateError('PositionNotFound', `Position ${positionId} missing after open`, { positionId });
        }

        this.logger.info(
          { positionId, ticker, shareCount, entryPrice: input.entryPrice, stopPrice, targetPrice },
          'position opened'
        );
        this.eventBus.emit('position.opened', { position, ts: this.now() });
        return positionId;
      } catch (error: unknown) {
        if (isTradingError(error)) {
          this.logger.warn({ ticker, code: error.code, reason: error.message }, 'entry rejected');
          this.eventBus.emit('entry.rejected', {
            ticker,
            entryPrice: input.entryPrice,
            code: error.code,
            reason: error.message,
            ts: this.now()
          });
        }

        throw error;
      }
    });
  }

  /**
   * Enters each screened candidate in order, sized against the same
   * `portfolioValue`. Trading rejections (capacity, duplicates, bad input)
   * are collected as skips; anything else aborts the batch.
   */
  async enterCandidates(candidates: readonly EntryCandidate[], portfolioValue: number): Promise<CandidateBatchResult> {
    const result: CandidateBatchResult = { entered: [], skipped: [] };

    for (const raw of candidates) {
      const parsed = entryCandidateSchema.safeParse(raw);
      if (!parsed.success) {
        const reason = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
        this.logger.warn({ ticker: raw.ticker, reason }, 'candidate rejected');
        result.skipped.push({ ticker: normalizeTicker(raw.ticker), code: 'InvalidEntry', reason });
        continue;
      }

      const candidate = parsed.data;
      try {
        const positionId = await this.enterPosition({ ...candidate, portfolioValue });
        result.entered.push({ ticker: normalizeTicker(candidate.ticker), positionId });
      } catch (error: unknown) {
        if (!isTradingError(error)) {
          throw error;
        }

        result.skipped.push({ ticker: normalizeTicker(candidate.ticker), code: error.code, reason: error.message });
      }
    }

    this.logger.info({ entered: result.entered.length, skipped: result.skipped.length }, 'candidate batch processed');
    return result;
  }

  async processPriceTick(ticker: string, currentPrice: number): Promise<TickOutcome> {
    if (!Number.isFinite(currentPrice) || currentPrice <= 0) {
      throw new InputValidationError('InvalidParameter', 'currentPrice must be a positive finite number', {
        ticker,
        currentPrice
      });
    }

    const normalized = normalizeTicker(ticker);
    return this.serialize(() => this.applyTick(normalized, currentPrice));
  }

  /**
   * Stop/target sweep over every open position that has a price. A quote
   * that is not a positive finite number is reported and skipped so the
   * remaining positions are still checked.
   */
  async processPriceTicks(pricesByTicker: Readonly<Record<string, number>>): Promise<TickOutcome[]> {
    const prices = new Map<string, number>();
    for (const [ticker, price] of Object.entries(pricesByTicker)) {
      prices.set(normalizeTicker(ticker), price);
    }

    const outcomes: TickOutcome[] = [];
    for (const position of await this.ledger.listOpen()) {
      const price = prices.get(position.ticker);
      if (price === undefined) {
        this.logger.debug({ ticker: position.ticker }, 'no price for open position, skipped');
        continue;
      }

      if (!Number.isFinite(price) || price <= 0) {
        this.logger.warn({ ticker: position.ticker, price }, 'invalid quote for open position, skipped');
        outcomes.push({ status: 'INVALID_PRICE', ticker: position.ticker, price });
        continue;
      }

      outcomes.push(await this.processPriceTick(position.ticker, price));
    }

    return outcomes;
  }

  async exitPositionManually(positionId: string, exitPrice: number): Promise<ClosedPositionSummary> {
    return this.serialize(() => this.closeAndEmit(positionId, exitPrice, 'MANUAL'));
  }

  private async applyTick(ticker: string, price: number): Promise<TickOutcome> {
    const open = await this.ledger.listOpen();
    const position = open.find((item) => item.ticker === ticker);
    if (!position) {
      return { status: 'IGNORED', ticker };
    }

    const { newStop, newHighest } = trailingStopUpdate(
      position.entryPrice,
      price,
      position.stopPrice,
      position.highestPriceSeen,
      this.params
    );

    let current = position;
    let stopAdjusted = false;

    if (newStop !== position.stopPrice || newHighest !== position.highestPriceSeen) {
      current = await this.ledger.updateStop(position.id, newStop, newHighest);

      if (current.stopPrice > position.stopPrice) {
        stopAdjusted = true;
        this.logger.info(
          { positionId: position.id, ticker, previousStop: position.stopPrice, newStop: current.stopPrice },
          'stop adjusted'
        );
        this.eventBus.emit('stop.adjusted', {
          positionId: position.id,
          ticker,
          previousStop: position.stopPrice,
          newStop: current.stopPrice,
          highestPriceSeen: current.highestPriceSeen,
          stopType: current.stopType,
          triggerPrice: price,
          ts: this.now()
        });
      }
    }

    const decision = evaluateExit(price, current.stopPrice, current.targetPrice);
    if (decision === 'NONE') {
      return { status: 'HELD', position: current, stopAdjusted };
    }

    const summary = await this.closeAndEmit(current.id, price, decision === 'STOP_HIT' ? 'STOP' : 'TARGET');
    return { status: 'CLOSED', summary, stopAdjusted };
  }

  private async closeAndEmit(positionId: string, exitPrice: number, reason: ExitReason): Promise<ClosedPositionSummary> {
    const summary = await this.ledger.close(positionId, exitPrice, reason);

    this.logger.info(
      {
        positionId,
        ticker: summary.ticker,
        reason,
        exitPrice,
        realizedReturnPct: summary.realizedReturnPct,
        realizedReturnAbsolute: summary.realizedReturnAbsolute
      },
      'position closed'
    );
    this.eventBus.emit('position.closed', { summary, ts: this.now() });
    return summary;
  }

  private serialize<T>(job: () => Promise<T>): Promise<T> {
    return this.queue.schedule(job);
  }
}
