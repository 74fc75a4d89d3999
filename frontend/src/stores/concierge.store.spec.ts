import { AxiosError, AxiosHeaders, type InternalAxiosRequestConfig } from 'axios';
import { createPinia, setActivePinia } from 'pinia';
import { conciergeApi } from '@/services/api.client';
import { EMPTY_QUERY_MESSAGE, useConciergeStore } from './concierge.store';

describe('useConciergeStore', () => {
  let ask: jest.SpyInstance<Promise<string>, [string]>;

  beforeEach(() => {
    setActivePinia(createPinia());
    ask = jest.spyOn(conciergeApi, 'ask');
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('stores the reply for a successful query', async () => {
    ask.mockResolvedValue('Breakfast is served from 7 to 10.');
    const store = useConciergeStore();

    await store.submitQuery('When is breakfast?');

    expect(ask).toHaveBeenCalledWith('When is breakfast?');
    expect(store.response).toBe('Breakfast is served from 7 to 10.');
    expect(store.error).toBeNull();
    expect(store.loading).toBe(false);
  });

  it.each(['', '   \n'])('refuses to send a blank query (%j)', async (query) => {
    const store = useConciergeStore();

    await store.submitQuery(query);

    expect(ask).not.toHaveBeenCalled();
    expect(store.error).toBe(EMPTY_QUERY_MESSAGE);
    expect(store.response).toBeNull();
  });

  it('is loading while the request is in flight', async () => {
    let resolveAsk: (reply: string) => void = () => undefined;
    ask.mockReturnValue(
      new Promise<string>((resolve) => {
        resolveAsk = resolve;
      }),
    );
    const store = useConciergeStore();

    const pending = store.submitQuery('Is there parking?');
    expect(store.loading).toBe(true);

    resolveAsk('Yes.');
    await pending;
    expect(store.loading).toBe(false);
  });

  it('shows the server error and clears the previous reply', async () => {
    const store = useConciergeStore();
    ask.mockResolvedValueOnce('First answer');
    await store.submitQuery('First question');

    const config: InternalAxiosRequestConfig = { headers: new AxiosHeaders() };
    ask.mockRejectedValueOnce(
      new AxiosError('Request failed with status code 500', AxiosError.ERR_BAD_RESPONSE, config, {}, {
        data: { error: 'Failed to classify your query. Please try again.' },
        status: 500,
        statusText: 'Internal Server Error',
        headers: {},
        config,
      }),
    );
    await store.submitQuery('Second question');

    expect(store.response).toBeNull();
    expect(store.error).toBe('Failed to classify your query. Please try again.');
  });
});
