import { defineStore } from 'pinia';
import { ref } from 'vue';
import { conciergeApi, describeApiError } from '@/services/api.client';

export const EMPTY_QUERY_MESSAGE = 'Please enter a query before submitting.';

export const useConciergeStore = defineStore('concierge', () => {
  const response = ref<string | null>(null);
  const error = ref<string | null>(null);
  const loading = ref(false);

  const submitQuery = async (query: string) => {
    response.value = null;
    error.value = null;

    if (!query.trim()) {
      error.value = EMPTY_QUERY_MESSAGE;
      return;
    }

    loading.value = true;
    try {
      response.value = await conciergeApi.ask(query);
    } catch (err: unknown) {
      error.value = describeApiError(err);
      console.error('Failed to answer query:', err);
    } finally {
      loading.value = false;
    }
  };

  return {
    response,
    error,
    loading,
    submitQuery,
  };
});
