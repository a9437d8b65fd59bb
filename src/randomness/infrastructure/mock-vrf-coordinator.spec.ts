import { RandomWordsRequest } from '../domain/randomness-oracle';
import { InvalidRandomWordsError, UnknownRandomnessRequestError } from '../domain/randomness.errors';
import { expandRandomWords } from '../domain/random-words';
import { MockVrfCoordinator } from './mock-vrf-coordinator';

const REQUEST: RandomWordsRequest = {
  keyHash: `0x${'0'.repeat(64)}`,
  subscriptionId: 7n,
  requestConfirmations: 3,
  callbackGasLimit: 500_000,
  numWords: 2,
  nativePayment: false,
};

describe('MockVrfCoordinator', () => {
  let coordinator: MockVrfCoordinator;
  let fulfill: jest.Mock<Promise<void>, [bigint, bigint[]]>;

  beforeEach(() => {
    coordinator = new MockVrfCoordinator();
    fulfill = jest.fn<Promise<void>, [bigint, bigint[]]>().mockResolvedValue(undefined);
  });

  it('numbers requests from 1 and keeps them pending', async () => {
    const consumer = { fulfillRandomWords: fulfill };

    expect(await coordinator.requestRandomWords(consumer, REQUEST)).toBe(1n);
    expect(await coordinator.requestRandomWords(consumer, REQUEST)).toBe(2n);

    expect(coordinator.getPendingRequests().map((request) => request.requestId)).toEqual([1n, 2n]);
    expect(coordinator.getPendingRequest(1n)).toMatchObject({ subscriptionId: 7n, numWords: 2 });
    expect(fulfill).not.toHaveBeenCalled();
  });

  it('rejects requests for zero words', async () => {
    await expect(
      coordinator.requestRandomWords({ fulfillRandomWords: fulfill }, { ...REQUEST, numWords: 0 }),
    ).rejects.toBeInstanceOf(RangeError);
  });

  it('delivers explicit words to the consumer and consumes the request', async () => {
    await coordinator.requestRandomWords({ fulfillRandomWords: fulfill }, REQUEST);

    expect(await coordinator.fulfillRandomWords(1n, [5n, 6n])).toEqual([5n, 6n]);

    expect(fulfill).toHaveBeenCalledWith(1n, [5n, 6n]);
    expect(coordinator.getPendingRequest(1n)).toBeUndefined();
  });

  it('derives words from the request id when none are given', async () => {
    await coordinator.requestRandomWords({ fulfillRandomWords: fulfill }, REQUEST);

    const words = await coordinator.fulfillRandomWords(1n);

    expect(words).toEqual(expandRandomWords(1n, 2));
    expect(words[0]).not.toBe(words[1]);
    expect(fulfill).toHaveBeenCalledWith(1n, words);
  });

  it('rejects unknown request ids', async () => {
    await expect(coordinator.fulfillRandomWords(9n, [1n])).rejects.toBeInstanceOf(UnknownRandomnessRequestError);
  });

  it('rejects the wrong number of words and keeps the request', async () => {
    await coordinator.requestRandomWords({ fulfillRandomWords: fulfill }, REQUEST);

    await expect(coordinator.fulfillRandomWords(1n, [1n])).rejects.toBeInstanceOf(InvalidRandomWordsError);

    expect(coordinator.getPendingRequest(1n)).toBeDefined();
    expect(fulfill).not.toHaveBeenCalled();
  });

  it('passes consumer errors through after consuming the request', async () => {
    fulfill.mockRejectedValueOnce(new Error('consumer failed'));
    await coordinator.requestRandomWords({ fulfillRandomWords: fulfill }, REQUEST);

    await expect(coordinator.fulfillRandomWords(1n, [1n, 2n])).rejects.toThrow('consumer failed');
    await expect(coordinator.fulfillRandomWords(1n, [1n, 2n])).rejects.toBeInstanceOf(
      UnknownRandomnessRequestError,
    );
  });
});
