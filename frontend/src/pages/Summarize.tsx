import { FormEvent, useState } from 'react';
import {
  getErrorMessage,
  getOverview,
  summarizeVideo,
  summaryLines,
  LLMProvider,
  SummaryMode,
  SummaryRecord,
  VideoOverview,
} from '../api';
import './Summarize.css';

function ChunkCard({ record }: { record: SummaryRecord }) {
  const lines = summaryLines(record.summary);

  return (
    <li className="card chunk-card">
      <div className="chunk-header">
        <span className="chunk-number">Part {record.chunk_index + 1}</span>
        <span className="chunk-time">
          {record.start_time} – {record.end_time}
        </span>
      </div>
      {lines.length > 0 ? (
        <ul className="bullet-list">
          {lines.map((line, i) => (
            <li key={i}>{line}</li>
          ))}
        </ul>
      ) : (
        <p className="chunk-missing">No summary available for this part.</p>
      )}
    </li>
  );
}

export function Summarize() {
  const [url, setUrl] = useState('');
  const [llmProvider, setLlmProvider] = useState<LLMProvider>('openai');
  const [mode, setMode] = useState<SummaryMode>('timeline');
  const [numPoints, setNumPoints] = useState(6);
  const [loading, setLoading] = useState(false);
  const [error, setError] = useState<string | null>(null);
  const [records, setRecords] = useState<SummaryRecord[] | null>(null);
  const [overview, setOverview] = useState<VideoOverview | null>(null);

  const handleSubmit = async (e: FormEvent<HTMLFormElement>) => {
    e.preventDefault();

    if (!url.trim()) {
      setError('Please enter a YouTube URL');
      return;
    }

    setLoading(true);
    setError(null);
    setRecords(null);
    setOverview(null);

    try {
      if (mode === 'timeline') {
        setRecords(await summarizeVideo(url.trim(), llmProvider));
      } else {
        setOverview(await getOverview(url.trim(), llmProvider, numPoints));
      }
    } catch (err) {
      setError(getErrorMessage(err, 'Failed to summarize video'));
      console.error(err);
    } finally {
      setLoading(false);
    }
  };

  return (
    <div className="summarize-page">
      <h1 className="page-title">YouTube Video Summarizer</h1>

      <form className="card form-card" onSubmit={handleSubmit}>
        <div className="form-group">
          <label htmlFor="url">YouTube URL *</label>
          <input
            type="text"
            id="url"
            value={url}
            onChange={(e) => setUrl(e.target.value)}
            placeholder="e.g., https://www.youtube.com/watch?v=..."
          />
        </div>

        <div className="form-row">
          <div className="form-group">
            <label htmlFor="llmProvider">AI Provider</label>
            <select
              id="llmProvider"
              value={llmProvider}
              onChange={(e) => setLlmProvider(e.target.value === 'anthropic' ? 'anthropic' : 'openai')}
            >
              <option value="openai">OpenAI-compatible</option>
              <option value="anthropic">Anthropic</option>
            </select>
          </div>

          {mode === 'overview' && (
            <div className="form-group">
              <label htmlFor="numPoints">Main Points</label>
              <input
                type="number"
                id="numPoints"
                value={numPoints}
                onChange={(e) => setNumPoints(parseInt(e.target.value) || 6)}
                min={1}
                max={20}
              />
            </div>
          )}
        </div>

        <div className="form-group">
          <label>Summary Mode</label>
          <div className="mode-selector">
            <button
              type="button"
              className={`mode-option ${mode === 'timeline' ? 'selected' : ''}`}
              onClick={() => setMode('timeline')}
            >
              <h4>Timeline</h4>
              <p>Bullet points for each part of the video</p>
            </button>
            <button
              type="button"
              className={`mode-option ${mode === 'overview' ? 'selected' : ''}`}
              onClick={() => setMode('overview')}
            >
              <h4>Overview</h4>
              <p>The main points of the whole video</p>
            </button>
          </div>
        </div>

        <button type="submit" className="btn primary" disabled={loading}>
          {loading ? 'Summarizing...' : 'Summarize'}
        </button>
      </form>

      {error && <div className="error-message">{error}</div>}

      {records && (
        <section className="results">
          <h2>Summary ({records.length} parts)</h2>
          {records.length === 0 ? (
            <p>The transcript is empty.</p>
          ) : (
            <ol className="chunk-list">
              {records.map((record) => (
                <ChunkCard key={record.chunk_index} record={record} />
              ))}
            </ol>
          )}
        </section>
      )}

      {overview && (
        <section className="results card">
          <h2>{overview.title}</h2>
          <ul className="bullet-list">
            {overview.points.map((point, i) => (
              <li key={i}>{point}</li>
            ))}
          </ul>
        </section>
      )}
    </div>
  );
}
