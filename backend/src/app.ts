/**
 * Application Wiring
 * Builds stores, ports and the hunt engine from settings
 */

import type { Settings } from './config/settings.js';
import { configureAnthropic } from './lib/anthropic.js';
import { JsonFileStorage } from './lib/storage/snapshotStorage.js';
import { ExpertsDocumentSchema, UserPrioritiesDocumentSchema } from './models/Expert.js';
import { TicketsDocumentSchema } from './models/Ticket.js';
import type { AppServices } from './api/routes/index.js';
import { ClaudeUrgencyClassifier, type UrgencyClassifier } from './services/classifier/urgencyClassifier.js';
import { DirectoryStore } from './services/directory/directoryStore.js';
import { ClaimResolver, createClaimLocks } from './services/hunt/claimResolver.js';
import { HuntEngine } from './services/hunt/huntEngine.js';
import { TicketCommands } from './services/hunt/ticketCommands.js';
import { SupportIntake } from './services/intake/supportIntake.js';
import type { Notifier } from './services/notifications/notifier.js';
import { SlackNotifier } from './services/notifications/slackNotifier.js';
import { TicketStore } from './services/tickets/ticketStore.js';

export interface AppOverrides {
  directory?: DirectoryStore;
  tickets?: TicketStore;
  notifier?: Notifier;
  classifier?: UrgencyClassifier;
}

/**
 * Load stores and assemble services. Hunts are not resumed here; call
 * `engine.resumeInterrupted()` once the transport is up.
 */
export function createApp(settings: Settings, overrides: AppOverrides = {}): AppServices {
  const directory =
    overrides.directory ??
    new DirectoryStore(
      new JsonFileStorage(settings.paths.experts, ExpertsDocumentSchema),
      new JsonFileStorage(settings.paths.userPriorities, UserPrioritiesDocumentSchema)
    );
  const tickets = overrides.tickets ?? new TicketStore(new JsonFileStorage(settings.paths.tickets, TicketsDocumentSchema));

  directory.load();
  tickets.load();

  const notifier =
    overrides.notifier ??
    new SlackNotifier({
      botToken: settings.slack.botToken ?? '',
      apiUrl: settings.slack.apiUrl,
      username: settings.botName,
    });

  let classifier = overrides.classifier;
  if (!classifier) {
    configureAnthropic(settings.classifier.apiKey);
    classifier = new ClaudeUrgencyClassifier({
      model: settings.classifier.model,
      botName: settings.botName,
      knownTags: () => directory.allExpertiseTags(),
    });
  }

  const locks = createClaimLocks();
  const resolver = new ClaimResolver(tickets, directory, locks);
  const engine = new HuntEngine({
    tickets,
    directory,
    notifier,
    resolver,
    locks,
    settings: settings.hunt,
    fallbackChannel: settings.fallbackChannel,
  });

  const intake = new SupportIntake({
    classifier,
    directory,
    tickets,
    engine,
    highUrgencyThreshold: settings.hunt.highUrgencyThreshold,
  });

  return {
    tickets,
    directory,
    engine,
    intake,
    commands: new TicketCommands(engine),
    locks,
  };
}
