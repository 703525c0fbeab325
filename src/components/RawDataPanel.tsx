import React, { useMemo, useState } from 'react';
import { ChevronDown, ChevronRight, Download } from 'lucide-react';
import type { PowerPlantRecord } from '../models/PowerPlant';
import { buildExportFileName, sortByCapacityDesc, toCsvBytes } from '../utils/powerPlantCsv';

const MAX_TABLE_ROWS = 1000;

interface RawDataPanelProps {
  country: string;
  columns: string[];
  records: PowerPlantRecord[];
}

const downloadBytes = (bytes: ReturnType<typeof toCsvBytes>, fileName: string) => {
  const blob = new Blob([bytes], { type: 'text/csv;charset=utf-8' });
  const url = URL.createObjectURL(blob);
  const link = document.createElement('a');
  link.href = url;
  link.download = fileName;
  document.body.appendChild(link);
  link.click();
  link.remove();
  URL.revokeObjectURL(url);
};

const RawDataPanel: React.FC<RawDataPanelProps> = ({ country, columns, records }) => {
  const [expanded, setExpanded] = useState(false);

  const sortedRows = useMemo(
    () => (expanded ? sortByCapacityDesc(records).slice(0, MAX_TABLE_ROWS) : []),
    [expanded, records]
  );

  const handleDownload = () => {
    downloadBytes(toCsvBytes(records, columns), buildExportFileName(country));
  };

  return (
    <section className="raw-data-panel">
      <button
        type="button"
        className="raw-data-toggle"
        onClick={() => setExpanded(!expanded)}
        aria-expanded={expanded}
      >
        {expanded ? <ChevronDown size={16} /> : <ChevronRight size={16} />}
        <span>View &amp; Download Raw Data</span>
      </button>

      {expanded && (
        <div className="raw-data-content">
          <div className="raw-data-actions">
            <span className="raw-data-count">
              {records.length > MAX_TABLE_ROWS
                ? `Showing ${MAX_TABLE_ROWS.toLocaleString('en-US')} of ${records.length.toLocaleString('en-US')} rows`
                : `${records.length.toLocaleString('en-US')} rows`}
            </span>
            <button type="button" className="download-button" onClick={handleDownload}>
              <Download size={16} />
              Download CSV
            </button>
          </div>
          <div className="raw-data-table-wrapper">
            <table className="raw-data-table">
              <thead>
                <tr>
                  {columns.map((column) => (
                    <th key={column}>{column}</th>
                  ))}
                </tr>
              </thead>
              <tbody>
                {sortedRows.map((record, index) => (
                  <tr key={`${record.name}-${index}`}>
                    {columns.map((column) => (
                      <td key={column}>{record.rawData[column]}</td>
                    ))}
                  </tr>
                ))}
              </tbody>
            </table>
          </div>
        </div>
      )}
    </section>
  );
};

export default RawDataPanel;
