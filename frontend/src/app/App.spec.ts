import { flushPromises, mount } from '@vue/test-utils';
import { createPinia } from 'pinia';
import { conciergeApi } from '@/services/api.client';
import App from './App.vue';

describe('App', () => {
  let ask: jest.SpyInstance<Promise<string>, [string]>;

  const mountApp = () => mount(App, { global: { plugins: [createPinia()] } });

  beforeEach(() => {
    ask = jest.spyOn(conciergeApi, 'ask');
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('renders the query form', () => {
    const wrapper = mountApp();

    expect(wrapper.find('h1').text()).toBe('Thira Beach Home');
    expect(wrapper.find('label').text()).toBe('Enter your query:');
    expect(wrapper.find('button').text()).toBe('Submit Query');
    expect(wrapper.find('.response').exists()).toBe(false);
  });

  it('shows the reply after submitting a query', async () => {
    ask.mockResolvedValue('Yes, every room has air conditioning.');
    const wrapper = mountApp();

    await wrapper.find('textarea').setValue('Is there air conditioning?');
    await wrapper.find('button').trigger('click');
    await flushPromises();

    expect(ask).toHaveBeenCalledWith('Is there air conditioning?');
    expect(wrapper.find('.response h2').text()).toBe('Response:');
    expect(wrapper.find('.response p').text()).toBe('Yes, every room has air conditioning.');
  });

  it('shows progress and disables the button while waiting', async () => {
    let resolveAsk: (reply: string) => void = () => undefined;
    ask.mockReturnValue(
      new Promise<string>((resolve) => {
        resolveAsk = resolve;
      }),
    );
    const wrapper = mountApp();

    await wrapper.find('textarea').setValue('Can I book the Loft?');
    await wrapper.find('button').trigger('click');

    expect(wrapper.find('.status').text()).toBe('Processing your query...');
    expect(wrapper.find<HTMLButtonElement>('button').element.disabled).toBe(true);

    resolveAsk('The Loft is free next week.');
    await flushPromises();

    expect(wrapper.find('.status').exists()).toBe(false);
    expect(wrapper.find<HTMLButtonElement>('button').element.disabled).toBe(false);
  });

  it('asks for a query instead of sending a blank one', async () => {
    const wrapper = mountApp();

    await wrapper.find('button').trigger('click');
    await flushPromises();

    expect(ask).not.toHaveBeenCalled();
    expect(wrapper.find('.error').text()).toBe('Please enter a query before submitting.');
  });

  it('shows request failures', async () => {
    ask.mockRejectedValue(new Error('Request timed out. Please try again.'));
    const wrapper = mountApp();

    await wrapper.find('textarea').setValue('Hello');
    await wrapper.find('button').trigger('click');
    await flushPromises();

    expect(wrapper.find('.error').text()).toBe('Request timed out. Please try again.');
  });
});
