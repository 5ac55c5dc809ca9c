import { useEffect, useState } from 'react';
import { fetchHealth } from '@/lib/api';
import type { HealthStatus } from '@/types/api';

export type ServiceHealth = HealthStatus | { status: 'unreachable'; modelLoaded: false };

const POLL_INTERVAL_MS = 5000;

/** Polls /health until the model reports loaded, then stops. */
export function useServiceHealth() {
  const [health, setHealth] = useState<ServiceHealth | null>(null);

  useEffect(() => {
    let cancelled = false;
    let timer: ReturnType<typeof setTimeout> | undefined;

    const poll = async () => {
      let next: ServiceHealth;
      try {
        next = await fetchHealth();
      } catch (error) {
        console.warn('[health] check failed', error);
        next = { status: 'unreachable', modelLoaded: false };
      }
      if (cancelled) {
        return;
      }
      setHealth(next);
      if (!next.modelLoaded) {
        timer = setTimeout(() => void poll(), POLL_INTERVAL_MS);
      }
    };

    void poll();
    return () => {
      cancelled = true;
      clearTimeout(timer);
    };
  }, []);

  return health;
}
