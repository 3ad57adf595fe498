import {
  COUNTER_RESPONSES,
  COUNTER_SERVFAIL_RESPONSES,
  PROVENANCE_BACKEND,
  PROVENANCE_RULE_SYNTHESIZED,
} from './constants.js';
import type { CounterRegistry } from './counters.js';
import { frontendCounterNames, isFrontendAccounted } from './rules.js';
import type { DnsResponse, FrontendName } from './types.js';

// once-per-transaction tally, called after the response is written (or given up on)
export class FrontendAccounting {
  private counters: CounterRegistry;

  constructor(counters: CounterRegistry) {
    this.counters = counters;
    this.counters.register(COUNTER_RESPONSES);
    this.counters.register(COUNTER_SERVFAIL_RESPONSES);
  }

  recordCompletion(frontend: FrontendName, response: DnsResponse): void {
    this.counters.increment(COUNTER_RESPONSES);

    // only a backend can fail; a rule answering SERVFAIL is policy
    if (response.provenance === PROVENANCE_BACKEND && response.rcode === 'SERVFAIL') {
      this.counters.increment(COUNTER_SERVFAIL_RESPONSES);
    }

    // synthesized responses were already attributed by the rule engine
    if (response.provenance !== PROVENANCE_RULE_SYNTHESIZED && isFrontendAccounted(response.rcode)) {
      for (const name of frontendCounterNames(frontend, response.rcode)) {
        this.counters.increment(name);
      }
    }
  }
}
