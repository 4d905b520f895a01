import React from 'react';
import { BrowserRouter as Router, Routes, Route } from 'react-router-dom';
import TabNav from './components/TabNav';
import { UsabilitySessionProvider } from './context/UsabilitySessionContext';
import Consent from './pages/Consent';
import Demographics from './pages/Demographics';
import ExitQuestionnaire from './pages/ExitQuestionnaire';
import Home from './pages/Home';
import Report from './pages/Report';
import TaskSession from './pages/TaskSession';
import { createUsabilityStore } from './services/storeFactory';

const store = createUsabilityStore();

function App() {
  return (
    <UsabilitySessionProvider store={store}>
      <Router>
        <div className="min-h-screen bg-gray-50">
          <TabNav />
          <Routes>
            <Route path="/" element={<Home />} />
            <Route path="/consent" element={<Consent />} />
            <Route path="/demographics" element={<Demographics />} />
            <Route path="/task" element={<TaskSession />} />
            <Route path="/exit" element={<ExitQuestionnaire />} />
            <Route path="/report" element={<Report />} />
          </Routes>
        </div>
      </Router>
    </UsabilitySessionProvider>
  );
}

export default App;
