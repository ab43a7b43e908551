import { createRateLimiter, createSequentialPacer } from '../rate-limiter';

describe('createRateLimiter', () => {
  it('spaces consecutive acquisitions by the delay', async () => {
    const waits: number[] = [];
    const limiter = createRateLimiter(500, async (ms) => {
      waits.push(ms);
    }, () => 1000);

    await limiter.acquire();
    await limiter.acquire();
    await limiter.acquire();

    expect(waits).toEqual([500, 1000]);
  });

  it('does not wait once the delay has already elapsed', async () => {
    let clock = 1000;
    const wait = jest.fn(async (_ms: number) => undefined);
    const limiter = createRateLimiter(500, wait, () => clock);

    await limiter.acquire();
    clock = 1600;
    await limiter.acquire();

    expect(wait).not.toHaveBeenCalled();
  });

  it('never waits with a zero delay', async () => {
    const wait = jest.fn(async (_ms: number) => undefined);
    const limiter = createRateLimiter(0, wait, () => 1000);

    await limiter.acquire();
    await limiter.acquire();

    expect(wait).not.toHaveBeenCalled();
  });
});

describe('createSequentialPacer', () => {
  it('waits the full delay before every acquisition after the first', async () => {
    const wait = jest.fn(async (_ms: number) => undefined);
    const pacer = createSequentialPacer(500, wait);

    await pacer.acquire();
    await pacer.acquire();
    await pacer.acquire();

    expect(wait.mock.calls).toEqual([[500], [500]]);
  });

  it('never waits with a zero delay', async () => {
    const wait = jest.fn(async (_ms: number) => undefined);
    const pacer = createSequentialPacer(0, wait);

    await pacer.acquire();
    await pacer.acquire();

    expect(wait).not.toHaveBeenCalled();
  });
});
