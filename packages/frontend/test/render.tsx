import type { ReactElement, ReactNode } from 'react';
import { render } from '@testing-library/react';
import { QueryClient, QueryClientProvider } from '@tanstack/react-query';

export function render_with_query(ui: ReactElement) {
  const query_client = new QueryClient({
    defaultOptions: {
      queries: { retry: false, gcTime: 0 },
      mutations: { retry: false },
    },
  });

  function Wrapper({ children }: { children: ReactNode }) {
    return <QueryClientProvider client={query_client}>{children}</QueryClientProvider>;
  }

  return { query_client, ...render(ui, { wrapper: Wrapper }) };
}
