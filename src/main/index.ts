#!/usr/bin/env node
/**
 * @file    main/index.ts
 * @purpose panesync command line: runs the relay, the primary (polls the
 *          capture server and replicates) or a terminal companion.
 * @owner   panesync maintainers
 * @depends main/config.ts and every runtime component
 *
 * Signals on primary and companion:
 *   SIGUSR1  primary enters background / companion display reduced
 *   SIGUSR2  primary returns to foreground / companion display active
 */

import { loadConfig, AppConfig, ConfigError } from './config';
import { ConsoleDisplay } from './console-display';
import { JsonFileStore } from '../shared/store';
import { SettingsStore } from '../shared/settings';
import { CaptureError } from '../shared/errors';
import { FrameCache } from '../capture/frame-cache';
import { HttpCaptureClient } from '../capture/http-capture-client';
import { Poller } from '../polling/poller';
import { NavigationController, NavigationResult } from '../navigation/navigation-controller';
import { ReplicationChannel } from '../replication/replication-channel';
import { CompanionReceiver } from '../replication/companion-receiver';
import { SwitchRequest } from '../replication/wire';
import { TerminalRenderer } from '../renderer/terminal-renderer';
import { RelayServer } from '../relay/server';
import { RelayClient } from '../relay/client';
import { RelayRole } from '../relay/protocol';

const USAGE = 'Usage: panesync <relay|primary|companion>';

export interface Running {
  stop(): void;
}

// ─────────────────────────────────────────────
// Roles
// ─────────────────────────────────────────────

export function runRelay(config: AppConfig): Running {
  const server = new RelayServer(config.relayPort, config.relayHost);
  server.start();
  return { stop: () => server.stop() };
}

export function runPrimary(config: AppConfig): Running {
  const store = new JsonFileStore(config.stateFile);
  const settings = new SettingsStore(store);
  const capture = new HttpCaptureClient({ serverUrl: config.serverUrl, token: config.token });
  const relay = new RelayClient({
    serverUrl: config.relayUrl,
    channelId: config.channelId,
    role: RelayRole.Primary,
  });

  const channel = new ReplicationChannel(relay, new TerminalRenderer({ resolveColors: false }), settings);
  const poller = new Poller(capture, {
    publisher: channel,
    settings,
    cache: new FrameCache(store, 'cache.primaryFrame'),
  });
  const navigation = new NavigationController(poller, capture, store);

  channel.on('refresh-requested', () => poller.requestResync());
  channel.on('reachability-changed', (reachable: boolean) => {
    if (reachable) poller.requestResync();
  });
  channel.on('switch-requested', (request: SwitchRequest) => {
    const run = request.scope === 'session'
      ? navigation.switchSession(request.direction)
      : navigation.switchWindow(request.direction);
    run
      .then((result) => logNavigation(result))
      .catch((err) => {
        const reason = err instanceof CaptureError ? `${err.kind}: ${err.message}` : String(err);
        console.warn(`[Primary] ${request.scope} switch failed (${reason})`);
      });
  });

  poller.on('unauthorized', () => {
    console.error('[Primary] Check PANESYNC_TOKEN; the capture server refused it');
  });
  poller.on('command-finished', () => {
    console.log('[Primary] Command finished');
  });

  const onBackground = (): void => poller.enterBackground();
  const onForeground = (): void => poller.enterForeground();
  process.on('SIGUSR1', onBackground);
  process.on('SIGUSR2', onForeground);

  channel.start();
  relay.connect();
  poller.start();

  return {
    stop: () => {
      process.off('SIGUSR1', onBackground);
      process.off('SIGUSR2', onForeground);
      poller.stop();
      channel.stop();
      relay.disconnect();
    },
  };
}

export function runCompanion(config: AppConfig): Running {
  const store = new JsonFileStore(config.stateFile);
  const settings = new SettingsStore(store);
  const relay = new RelayClient({
    serverUrl: config.relayUrl,
    channelId: config.channelId,
    role: RelayRole.Companion,
  });
  const receiver = new CompanionReceiver(relay, new ConsoleDisplay(), {
    settings,
    cache: new FrameCache(store, 'cache.companionFrame'),
  });

  receiver.on('command-finished', () => {
    console.log('[Companion] Command finished');
  });

  const onReduced = (): void => receiver.setDisplayReduced(true);
  const onActive = (): void => receiver.setDisplayReduced(false);
  process.on('SIGUSR1', onReduced);
  process.on('SIGUSR2', onActive);

  relay.connect();
  receiver.start();

  return {
    stop: () => {
      process.off('SIGUSR1', onReduced);
      process.off('SIGUSR2', onActive);
      receiver.stop();
      relay.disconnect();
    },
  };
}

function logNavigation(result: NavigationResult): void {
  if (result.status === 'switched') {
    const frame = result.frame;
    console.log(`[Primary] Now on ${frame.sessionId}:${frame.windowIndex} (${result.via}, ${result.attempts} attempt(s))`);
  } else {
    console.log(`[Primary] Navigation left the pane unchanged: ${result.reason}`);
  }
}

// ─────────────────────────────────────────────
// Entry point
// ─────────────────────────────────────────────

export function main(argv: string[]): void {
  const role = argv[0];
  if (role !== 'relay' && role !== 'primary' && role !== 'companion') {
    console.error(USAGE);
    process.exitCode = 1;
    return;
  }

  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (err) {
    if (!(err instanceof ConfigError)) throw err;
    console.error(`[panesync] ${err.message}`);
    process.exitCode = 1;
    return;
  }

  const running = role === 'relay'
    ? runRelay(config)
    : role === 'primary'
      ? runPrimary(config)
      : runCompanion(config);

  const shutdown = (): void => {
    running.stop();
    process.exit(0);
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

if (require.main === module) {
  main(process.argv.slice(2));
}
