import { Routes, Route, Link } from 'react-router-dom';
import { Summarize } from './pages/Summarize';
import { Status } from './pages/Status';
import './App.css';

function App() {
  return (
    <div className="app">
      <header className="app-header">
        <h1>
          <Link to="/">🎬 Video Summarizer</Link>
        </h1>
        <nav>
          <Link to="/" className="nav-link">
            Summarize
          </Link>
          <Link to="/status" className="nav-link">
            Status
          </Link>
        </nav>
      </header>

      <main className="app-main">
        <Routes>
          <Route path="/" element={<Summarize />} />
          <Route path="/status" element={<Status />} />
        </Routes>
      </main>

      <footer className="app-footer">
        <p>Video Summarizer - timestamped bullet points from YouTube transcripts</p>
      </footer>
    </div>
  );
}

export default App;
