/**
 * Request Pipeline
 *
 * Turns a requested filename into a torrent:
 *   parse -> resolve -> search -> match -> build   (search mode)
 *   parse -> build                                  (fixed-hash mode)
 *
 * Every failure becomes an outcome ending `failed -> responded`; nothing here
 * throws to the caller.
 */

import { createLogger, type Logger } from '@torrent-forge/plugin-utils';
import { FilenameParser } from './parsers/filename-parser.js';
import { ReleaseMatcher } from './matching/matcher.js';
import { RequestStateMachine } from './state-machine.js';
import { TorrentBuilder } from './torrent/builder.js';
import { ConfigError } from './errors.js';
import type {
  ForgeMode,
  MediaIdentity,
  MetadataResolver,
  PipelineOutcome,
  ReleaseSearcher,
  ResolvedMedia,
} from './types.js';

export interface PipelineOptions {
  mode: ForgeMode;
  /** Target hash for fixed-hash mode */
  infoHash: string;
  matchThreshold: number;
  builder: TorrentBuilder;
  resolver?: MetadataResolver;
  searcher?: ReleaseSearcher;
  matcher?: ReleaseMatcher;
  logger?: Logger;
}

/**
 * Search input for an identity the resolver did not recognise
 */
export function identityToMedia(identity: MediaIdentity): ResolvedMedia {
  return {
    kind: identity.kind,
    title: identity.title,
    year: identity.year,
    season: identity.season,
    episode: identity.episode,
  };
}

export class RequestPipeline {
  private readonly options: PipelineOptions;
  private readonly matcher: ReleaseMatcher;
  private readonly logger: Logger;

  constructor(options: PipelineOptions) {
    if (options.mode === 'search' && (!options.resolver || !options.searcher)) {
      throw new ConfigError(['search mode needs a metadata resolver and a release searcher']);
    }
    this.options = options;
    this.logger = options.logger ?? createLogger('torrent-forge:pipeline');
    this.matcher = options.matcher ?? new ReleaseMatcher(this.logger.child('matcher'));
  }

  get mode(): ForgeMode {
    return this.options.mode;
  }

  async run(filename: string): Promise<PipelineOutcome> {
    const machine = new RequestStateMachine(this.logger.child('state'));
    this.logger.debug(`Request for ${filename}`, { mode: this.options.mode });

    if (FilenameParser.stripExtension(filename).length === 0) {
      return this.notFound(machine, 'Empty filename');
    }

    try {
      const identity = FilenameParser.parse(filename);
      if (this.options.mode === 'search' && identity.title.length === 0) {
        return this.notFound(machine, 'Empty filename');
      }
      machine.transition('parsed');

      if (this.options.mode === 'fixed') {
        const torrent = this.options.builder.buildFixed(identity.source, this.options.infoHash);
        machine.transition('built');
        machine.transition('responded');
        this.logger.success(`Built ${torrent.fileName}`, { infoHash: torrent.infoHash });
        return { status: 'ok', torrent, identity, history: machine.getHistory() };
      }

      const { resolver, searcher } = this.options;
      if (!resolver || !searcher) {
        throw new ConfigError(['search mode needs a metadata resolver and a release searcher']);
      }

      const resolved = await resolver.resolve(identity);
      if (!resolved) {
        this.logger.info('Resolver did not recognise the title, searching the parsed identity', {
          title: identity.title,
          kind: identity.kind,
        });
      }
      machine.transition('resolved');

      const candidates = await searcher.search(resolved ?? identityToMedia(identity));
      machine.transition('searched');

      const match = this.matcher.bestMatch(identity, candidates, this.options.matchThreshold);
      if (!match) {
        machine.transition('no_match');
        machine.transition('responded');
        return {
          status: 'not_found',
          reason: `No release matched ${identity.source}`,
          history: machine.getHistory(),
        };
      }
      machine.transition('matched');

      const torrent = this.options.builder.buildFromCandidate(identity.source, match.candidate);
      machine.transition('built');
      machine.transition('responded');
      this.logger.success(`Built ${torrent.fileName}`, {
        infoHash: torrent.infoHash,
        score: Number(match.score.toFixed(4)),
      });
      return { status: 'ok', torrent, identity, match, history: machine.getHistory() };
    } catch (error) {
      const failure = error instanceof Error ? error : new Error(String(error));
      this.logger.error(`Request for ${filename} failed`, {
        error: failure.message,
        state: machine.state,
      });
      this.finishFailed(machine);
      return { status: 'error', reason: failure.message, error: failure, history: machine.getHistory() };
    }
  }

  private notFound(machine: RequestStateMachine, reason: string): PipelineOutcome {
    this.finishFailed(machine);
    return { status: 'not_found', reason, history: machine.getHistory() };
  }

  private finishFailed(machine: RequestStateMachine): void {
    if (machine.state === 'responded') return;
    machine.transition('failed');
    machine.transition('responded');
  }
}
