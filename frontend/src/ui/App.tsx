import React, { useCallback, useMemo, useState } from 'react';
import { DATA_URL } from '../config';
import { toYMD } from '../data/dates';
import { downloadWorkbook, EXPORT_FILENAME } from '../data/exporter';
import { Table } from '../data/types';
import { logger } from '../logger';
import { ChartGrid } from './ChartGrid';
import { DashboardHeader } from './DashboardHeader';
import { DataPreview } from './DataPreview';
import { EmptyState } from './EmptyState';
import { FilterSidebar } from './FilterSidebar';
import { MetricsStrip } from './MetricsStrip';
import { SkeletonLoader } from './SkeletonLoader';
import { useDashboard } from './useDashboard';

const log = logger.child('app');

interface AppProps {
	source?: string;
	// Pre-loaded table (skips fetching); used when embedding and in tests
	initialTable?: Table;
}

export const App: React.FC<AppProps> = ({ source = DATA_URL, initialTable }) => {
	const { state, derived, setDateRange, setSelection, resetFilters, openFile, exportView } = useDashboard(source, initialTable);
	const [liveStatus, setLiveStatus] = useState('');

	const periodLabel = useMemo(() => {
		const range = derived?.state.dateRange;
		return range ? `${toYMD(new Date(range.start))} to ${toYMD(new Date(range.end))}` : 'Full Dataset';
	}, [derived]);

	const handleDownload = useCallback(() => {
		const bytes = exportView();
		if (!bytes) return;
		downloadWorkbook(bytes, EXPORT_FILENAME);
		log.info('exported view', { rows: derived?.view.rows.length ?? 0, bytes: bytes.byteLength });
		setLiveStatus(`Downloaded ${EXPORT_FILENAME}.`);
	}, [exportView, derived]);

	return (
		<div className="app-shell">
			<DashboardHeader source={state.source} onOpenFile={openFile} />
			{state.status === 'loading' && (
				<main className="main loading" aria-busy="true">
					<SkeletonLoader type="card" count={4} />
					<SkeletonLoader type="chart" count={2} />
				</main>
			)}
			{state.status === 'error' && (
				<main className="main">
					<div className="load-error" role="alert">
						<h2 className="load-error-title">Unable to load lending data</h2>
						<p className="load-error-message">{state.error.message}</p>
						<p className="load-error-hint">Check that the file exists and is a delimited text file with a header row, or open another file.</p>
					</div>
				</main>
			)}
			{state.status === 'ready' && derived && (
				<div className="layout">
					<FilterSidebar
						options={state.session.options}
						filters={state.filters}
						onDateRange={setDateRange}
						onSelection={setSelection}
						onReset={resetFilters}
					/>
					<main className="main">
						<MetricsStrip metrics={derived.metrics} periodLabel={periodLabel} />
						{derived.warning ? (
							<EmptyState
								type={state.session.table.rows.length === 0 ? 'no-data' : 'no-results'}
								onAction={resetFilters}
							/>
						) : (
							<ChartGrid charts={derived.charts} />
						)}
						<DataPreview view={derived.view} />
						{!derived.warning && (
							<div className="download-actions">
								<button type="button" className="download-btn excel" onClick={handleDownload} title="Download filtered rows as Excel">
									⬇️ <span className="kw">Download as Excel</span>
								</button>
							</div>
						)}
						<div aria-live="polite" className="sr-only" id="status-msg">{liveStatus}</div>
					</main>
				</div>
			)}
		</div>
	);
};
