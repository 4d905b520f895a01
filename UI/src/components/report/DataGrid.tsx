import React from 'react';
import StatusMessage from '../StatusMessage';

export interface DataGridColumn<T> {
  key: string;
  label: string;
  render: (row: T) => React.ReactNode;
}

interface DataGridProps<T> {
  title: string;
  rows: T[];
  columns: DataGridColumn<T>[];
  emptyMessage: string;
}

function DataGrid<T>({ title, rows, columns, emptyMessage }: DataGridProps<T>) {
  return (
    <section className="bg-white rounded-lg border border-gray-200 p-6">
      <h2 className="text-lg font-semibold text-gray-800 mb-3">{title}</h2>
      {rows.length === 0 ? (
        <StatusMessage tone="info">{emptyMessage}</StatusMessage>
      ) : (
        <div className="overflow-x-auto">
          <table className="min-w-full text-sm text-left">
            <thead>
              <tr className="border-b border-gray-200 text-gray-600">
                {columns.map((column) => (
                  <th key={column.key} className="px-3 py-2 font-medium">{column.label}</th>
                ))}
              </tr>
            </thead>
            <tbody>
              {rows.map((row, index) => (
                <tr key={index} className="border-b border-gray-100 last:border-0">
                  {columns.map((column) => (
                    <td key={column.key} className="px-3 py-2 text-gray-800">{column.render(row)}</td>
                  ))}
                </tr>
              ))}
            </tbody>
          </table>
        </div>
      )}
    </section>
  );
}

export default DataGrid;
