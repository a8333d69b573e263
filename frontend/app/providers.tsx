// app/providers.tsx
// Global providers for the whole app:
// - React Query: caching + request deduplication

"use client";

import { PropsWithChildren, useState } from "react";
import { QueryClient, QueryClientProvider } from "@tanstack/react-query";

export function Providers({ children }: PropsWithChildren) {
  // One client per browser session; avoids sharing cache between server renders
  const [queryClient] = useState(
    () =>
      new QueryClient({
        defaultOptions: {
          // Upstream API is rate limited; do not hammer it on errors
          queries: { retry: false, refetchOnWindowFocus: false },
        },
      })
  );

  return <QueryClientProvider client={queryClient}>{children}</QueryClientProvider>;
}
