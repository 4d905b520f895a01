import React from 'react';
import { NavLink } from 'react-router-dom';

export const USABILITY_TABS = [
  { path: '/', label: 'Home' },
  { path: '/consent', label: 'Consent' },
  { path: '/demographics', label: 'Demographics' },
  { path: '/task', label: 'Task' },
  { path: '/exit', label: 'Exit Questionnaire' },
  { path: '/report', label: 'Report' },
] as const;

const TabNav: React.FC = () => {
  return (
    <nav className="bg-white border-b border-gray-200">
      <div className="max-w-6xl mx-auto px-4 flex gap-1 overflow-x-auto">
        {USABILITY_TABS.map((tab) => (
          <NavLink
            key={tab.path}
            to={tab.path}
            end={tab.path === '/'}
            className={({ isActive }) =>
              `px-4 py-3 text-sm font-medium border-b-2 whitespace-nowrap ${
                isActive
                  ? 'border-blue-600 text-blue-700'
                  : 'border-transparent text-gray-600 hover:text-gray-800'
              }`
            }
          >
            {tab.label}
          </NavLink>
        ))}
      </div>
    </nav>
  );
};

export default TabNav;
