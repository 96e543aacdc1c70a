import { describe, it, expect, vi } from 'vitest';
import { AppError } from '../../../../src/shared/http/errors';
import { ServiceCollection } from '../../../../src/shared/di';

const closed: string[] = [];

class Clock {
  close() {
    closed.push('Clock');
  }
}

class RequestLog {
  close() {
    closed.push('RequestLog');
  }
}

class Report {
  constructor(
    readonly clock: Clock,
    readonly log: RequestLog,
  ) {}

  async close() {
    await Promise.resolve();
    closed.push('Report');
  }
}

class Stamp {}

abstract class Store {
  abstract read(): string;
}

class MemoryStore extends Store {
  read() {
    return 'memory';
  }
}

function buildContainer() {
  closed.length = 0;
  return new ServiceCollection()
    .addSingleton(Clock, () => new Clock())
    .addScoped(RequestLog, () => new RequestLog())
    .addScoped(Report, async (p) => new Report(await p.get(Clock), await p.get(RequestLog)))
    .addTransient(Stamp, () => new Stamp())
    .addSingleton(Store, () => new MemoryStore())
    .build();
}

async function captureError(promise: Promise<unknown>): Promise<AppError> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof AppError) return err;
    throw err;
  }
  throw new Error('expected promise to reject');
}

describe('ServiceContainer lifetimes', () => {
  it('shares one singleton across the root and every scope', async () => {
    const container = buildContainer();
    const a = container.createScope();
    const b = container.createScope();

    const fromRoot = await container.get(Clock);
    expect(await a.get(Clock)).toBe(fromRoot);
    expect(await b.get(Clock)).toBe(fromRoot);
  });

  it('creates one scoped instance per scope', async () => {
    const container = buildContainer();
    const a = container.createScope();
    const b = container.createScope();

    const first = await a.get(RequestLog);
    expect(await a.get(RequestLog)).toBe(first);
    expect(await b.get(RequestLog)).not.toBe(first);
  });

  it('creates a new transient on every get', async () => {
    const scope = buildContainer().createScope();

    expect(await scope.get(Stamp)).not.toBe(await scope.get(Stamp));
  });

  it('wires scoped dependencies from the same scope', async () => {
    const scope = buildContainer().createScope();

    const report = await scope.get(Report);
    expect(report.log).toBe(await scope.get(RequestLog));
  });

  it('constructs a scoped service once when requested concurrently', async () => {
    const factory = vi.fn(async () => {
      await new Promise((resolve) => setTimeout(resolve, 5));
      return new RequestLog();
    });
    const scope = new ServiceCollection().addScoped(RequestLog, factory).build().createScope();

    const results = await Promise.all([scope.get(RequestLog), scope.get(RequestLog)]);

    expect(factory).toHaveBeenCalledTimes(1);
    expect(results[0]).toBe(results[1]);
  });

  it('resolves an abstract class key to its registered implementation', async () => {
    const store = await buildContainer().get(Store);

    expect(store).toBeInstanceOf(MemoryStore);
    expect(store.read()).toBe('memory');
  });
});

describe('ServiceContainer errors', () => {
  it('refuses scoped services at the root', async () => {
    const err = await captureError(buildContainer().get(RequestLog));

    expect(err.code).toBe('INTERNAL');
    expect(err.message).toBe('Scoped service cannot be resolved outside a scope');
    expect(err.meta).toEqual({ service: 'RequestLog' });
  });

  it('prevents a singleton from capturing a scoped service', async () => {
    class Captive {}
    const scope = new ServiceCollection()
      .addScoped(RequestLog, () => new RequestLog())
      .addSingleton(Captive, async (p) => {
        await p.get(RequestLog);
        return new Captive();
      })
      .build()
      .createScope();

    const err = await captureError(scope.get(Captive));
    expect(err.message).toBe('Scoped service cannot be resolved outside a scope');
  });

  it('reports unregistered services', async () => {
    class Unknown {}
    const err = await captureError(buildContainer().createScope().get(Unknown));

    expect(err.message).toBe('Service is not registered');
    expect(err.meta).toEqual({ service: 'Unknown' });
  });

  it('rejects registering the same class twice', () => {
    const services = new ServiceCollection().addSingleton(Clock, () => new Clock());

    expect(() => services.addScoped(Clock, () => new Clock())).toThrowError(
      'Service is already registered',
    );
  });

  it('rejects a factory that returns an instance of another class', async () => {
    const scope = new ServiceCollection()
      .addScoped(RequestLog, () => new Clock())
      .build()
      .createScope();

    const err = await captureError(scope.get(RequestLog));
    expect(err.message).toBe('Service factory returned an instance of another type');
  });

  it('does not cache a failed construction', async () => {
    let attempts = 0;
    const scope = new ServiceCollection()
      .addScoped(RequestLog, () => {
        attempts += 1;
        if (attempts === 1) throw new Error('connection refused');
        return new RequestLog();
      })
      .build()
      .createScope();

    await expect(scope.get(RequestLog)).rejects.toThrowError('connection refused');
    await expect(scope.get(RequestLog)).resolves.toBeInstanceOf(RequestLog);
    expect(attempts).toBe(2);
  });
});

describe('ServiceScope.dispose', () => {
  it('closes scoped and transient instances in reverse creation order, not singletons', async () => {
    const container = buildContainer();
    const scope = container.createScope();

    await scope.get(Report); // Clock (singleton), RequestLog, Report

    await scope.dispose();

    expect(closed).toEqual(['Report', 'RequestLog']);
  });

  it('is idempotent and blocks later resolution', async () => {
    const scope = buildContainer().createScope();
    await scope.get(RequestLog);

    await scope.dispose();
    await scope.dispose();

    expect(closed).toEqual(['RequestLog']);
    expect(scope.isDisposed).toBe(true);

    const err = await captureError(scope.get(RequestLog));
    expect(err.message).toBe('Service scope is already disposed');
  });

  it('closes every instance even when one close fails', async () => {
    class Flaky {
      close() {
        throw new Error('flaky close');
      }
    }
    const scope = new ServiceCollection()
      .addScoped(RequestLog, () => new RequestLog())
      .addScoped(Flaky, () => new Flaky())
      .build()
      .createScope();
    closed.length = 0;

    await scope.get(RequestLog);
    await scope.get(Flaky);

    await expect(scope.dispose()).rejects.toThrowError('flaky close');
    expect(closed).toEqual(['RequestLog']);
  });

  it('closes an instance whose construction finishes after dispose', async () => {
    let release = () => {};
    const gate = new Promise<void>((resolve) => {
      release = () => resolve();
    });
    const scope = new ServiceCollection()
      .addScoped(RequestLog, async () => {
        await gate;
        return new RequestLog();
      })
      .build()
      .createScope();
    closed.length = 0;

    const pending = captureError(scope.get(RequestLog));
    await scope.dispose();
    release();

    const err = await pending;
    expect(err.code).toBe('INTERNAL');
    expect(err.message).toBe('Service scope is already disposed');
    expect(closed).toEqual(['RequestLog']);

    await scope.dispose();
    expect(closed).toEqual(['RequestLog']);
  });
});

describe('ServiceContainer.close', () => {
  it('closes singletons', async () => {
    const container = buildContainer();
    await container.get(Clock);

    await container.close();

    expect(closed).toEqual(['Clock']);
  });
});
