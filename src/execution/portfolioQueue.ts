import Bottleneck from 'bottleneck';

// One single-slot queue per portfolio id, shared by the coordinator and the
// valuation service so a valuation's cash and position reads cannot straddle
// a trade.
const PORTFOLIO_QUEUES = new Bottleneck.Group({ maxConcurrent: 1 });

export function portfolioQueue(portfolioId: string, group: Bottleneck.Group = PORTFOLIO_QUEUES): Bottleneck {
  return group.key(portfolioId);
}
