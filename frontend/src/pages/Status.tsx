import { useState, useEffect } from 'react';
import { getHealth, HealthStatus } from '../api';

export function Status() {
  const [health, setHealth] = useState<HealthStatus | null>(null);
  const [error, setError] = useState<string | null>(null);

  useEffect(() => {
    getHealth()
      .then(setHealth)
      .catch((err: unknown) => {
        setError('Failed to load service status');
        console.error(err);
      });
  }, []);

  if (error) {
    return <div className="error-message">{error}</div>;
  }

  if (!health) {
    return <div className="loading">Checking services...</div>;
  }

  return (
    <div className="card">
      <h1 className="page-title">Service Status: {health.status}</h1>
      <ul>
        <li>OpenAI-compatible: {health.services.llm.openai ? 'available' : 'unavailable'}</li>
        <li>Anthropic: {health.services.llm.anthropic ? 'available' : 'unavailable'}</li>
      </ul>
      <h2>Settings</h2>
      <ul>
        <li>Default provider: {health.config.defaultProvider}</li>
        <li>Chunk length: {Math.round(health.config.chunkDurationSeconds / 60)} min</li>
        <li>Parallel summaries: {health.config.summaryConcurrency}</li>
        <li>Timeout per summary: {health.config.summaryTimeoutMs / 1000}s</li>
      </ul>
    </div>
  );
}
