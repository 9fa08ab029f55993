import React from 'react';
import { createRoot } from 'react-dom/client';
import './errorProbe'; // inject runtime error probe first
import { App } from './ui/App';
import { ErrorBoundary } from './ui/ErrorBoundary';
import './styles/theme.css';

const container = document.getElementById('root');
if (!container) throw new Error('Missing #root element');

createRoot(container).render(
	<React.StrictMode>
		<ErrorBoundary>
			<App />
		</ErrorBoundary>
	</React.StrictMode>
);
