import { DiscoveryUnavailable, type ServiceDiscovery } from '@homelab/discovery';
import {
  type ApiFailure,
  type ApiSuccess,
  CategoryLabel,
  type CriticalPrimer,
  type SystemdPrimer,
} from '@homelab/shared';
import { Hono } from 'hono';
import { type Logger, logger as defaultLogger } from './logger.js';

function ok<T>(data: T, message: string): ApiSuccess<T> {
  return { success: true, data, message };
}

function fail(error: string, message: string): ApiFailure {
  return { success: false, error, message };
}

// Wire names below are the ones the browser dashboard reads.

function systemdContext(primer: SystemdPrimer | undefined) {
  if (!primer) return undefined;
  return {
    what_is_systemd: primer.whatIsSystemd,
    what_are_services: primer.whatAreServices,
    service_states: primer.serviceStates,
    learning_commands: primer.learningCommands,
  };
}

function criticalContext(primer: CriticalPrimer | undefined) {
  if (!primer) return undefined;
  return {
    what_are_critical_services: primer.whatAreCriticalServices,
    why_monitor_them: primer.whyMonitorThem,
    learning_objective: primer.learningObjective,
  };
}

/**
 * JSON endpoints over service discovery. Each request runs one fresh
 * enumeration; failures are answered with the `{success: false}` envelope.
 */
export function createApp(discovery: ServiceDiscovery, log: Logger = defaultLogger): Hono {
  const app = new Hono();

  app.get('/health', (c) =>
    c.json({
      status: 'healthy',
      service: 'homelab',
      timestamp: new Date().toISOString(),
    }),
  );

  app.get('/api/services', async (c) => {
    const { services, summary } = await discovery.getServiceSummary();
    return c.json(
      ok(
        { services, summary, educational_context: systemdContext(discovery.systemdPrimer()) },
        `Discovered ${summary.total} services`,
      ),
    );
  });

  app.get('/api/services/categories', async (c) => {
    const categories = await discovery.getServicesByCategory();
    const present = CategoryLabel.options.filter((label) => categories[label] !== undefined);
    return c.json(
      ok(
        { categories, category_descriptions: discovery.describeCategories(present) },
        `Services grouped into ${present.length} categories`,
      ),
    );
  });

  app.get('/api/services/critical', async (c) => {
    const criticalServices = await discovery.getCriticalServices();
    return c.json(
      ok(
        {
          critical_services: criticalServices,
          educational_context: criticalContext(discovery.criticalPrimer()),
        },
        `Resolved ${Object.keys(criticalServices).length} critical services`,
      ),
    );
  });

  app.notFound((c) => c.json(fail('Not found', `No route for ${c.req.method} ${c.req.path}`), 404));

  app.onError((err, c) => {
    if (err instanceof DiscoveryUnavailable) {
      log.error({ err, path: c.req.path }, 'Service discovery unavailable');
      return c.json(fail(err.message, 'Failed to query systemd services'), 503);
    }
    log.error({ err, path: c.req.path }, 'Unhandled request error');
    return c.json(fail('Internal server error', 'Unexpected error while handling the request'), 500);
  });

  return app;
}
