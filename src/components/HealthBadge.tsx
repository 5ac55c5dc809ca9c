import type { ServiceHealth } from '@/hooks/useServiceHealth';

const copy: Record<ServiceHealth['status'], { label: string; color: string }> = {
  ok: { label: 'Model ready', color: '#16a34a' },
  degraded: { label: 'Model loading…', color: '#d97706' },
  unreachable: { label: 'Service unreachable', color: '#dc2626' }
};

export function HealthBadge({ health }: { health: ServiceHealth | null }) {
  if (!health) {
    return <small className="health-badge">Checking service…</small>;
  }
  const { label, color } = copy[health.status];
  return (
    <small className="health-badge" style={{ color }}>
      {label}
    </small>
  );
}
