import { CONFIG, type AppConfig } from './config';
import { moduleLogger } from './logger';
import { fetchCrtSh } from './sources/crtsh';
import { loadExtraWords } from './wordlist';
import { isSubdomain, normalizeHostname, uniqueEverSeen } from './subdomain';

const logger = moduleLogger('collector');

export interface CollectorDeps {
  crtSh?: (domain: string) => Promise<string[]>;
  extraWords?: () => Promise<string[]>;
  bruteforce?: AppConfig['BRUTEFORCE'];
}

/**
 * Builds the candidate list for one pass: crt.sh names, the root itself,
 * then `<word>.<domain>` for every distinct bruteforce term. Deduplicated in
 * first-seen order and restricted to the root's subtree.
 */
export class CandidateCollector {
  private readonly crtSh: (domain: string) => Promise<string[]>;
  private readonly extraWords: () => Promise<string[]>;
  private readonly baseWords: string[];

  constructor(deps: CollectorDeps = {}) {
    const bruteforce = deps.bruteforce ?? CONFIG.BRUTEFORCE;
    this.crtSh = deps.crtSh ?? ((domain) => fetchCrtSh(domain));
    this.extraWords = deps.extraWords ?? (() => loadExtraWords(bruteforce));
    this.baseWords = bruteforce.WORDS;
  }

  async bruteforceTerms(): Promise<string[]> {
    const extra = await this.extraWords();
    const words = [...this.baseWords, ...extra].map((w) => w.trim().toLowerCase()).filter(Boolean);
    return uniqueEverSeen(words);
  }

  async collect(domain: string): Promise<string[]> {
    const fromCt = await this.crtSh(domain);
    const terms = await this.bruteforceTerms();
    const candidates: string[] = [...fromCt, domain];
    for (const term of terms) {
      const name = normalizeHostname(`${term}.${domain}`);
      if (name) candidates.push(name);
    }
    const result = uniqueEverSeen(candidates.filter((name) => isSubdomain(name, domain)));
    logger.debug({ domain, crtSh: fromCt.length, bruteforce: terms.length, total: result.length }, 'candidates collected');
    return result;
  }
}

export default CandidateCollector;
