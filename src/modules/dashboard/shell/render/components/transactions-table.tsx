// eslint-disable-next-line @typescript-eslint/naming-convention -- React is a third-party naming standard
import * as React from 'react';

import { formatCurrency } from '../../../core/format.js';
import { styles } from '../styles.js';

import type { Transaction } from '../../../../finance-data/core/types.js';

export interface TransactionsTableProps {
  rows: readonly Transaction[];
  /** Adds the director columns shown in the detail table */
  withDirector?: boolean;
}

export const TransactionsTable = ({
  rows,
  withDirector = false,
}: TransactionsTableProps): React.ReactElement => (
  <table style={styles.table}>
    <thead>
      <tr>
        <th style={styles.th}>Date</th>
        <th style={styles.th}>Department</th>
        <th style={styles.th}>Category</th>
        <th style={{ ...styles.th, textAlign: 'right' }}>Amount</th>
        {withDirector && <th style={styles.th}>Director</th>}
        {withDirector && <th style={styles.th}>Director Since</th>}
      </tr>
    </thead>
    <tbody>
      {rows.map((row, i) => (
        <tr key={`${row.transaction_date}-${String(i)}`}>
          <td style={styles.td}>{row.transaction_date}</td>
          <td style={styles.td}>{row.department_name}</td>
          <td style={styles.td}>{row.expenditure_category}</td>
          <td style={styles.tdNumber}>{formatCurrency(row.amount)}</td>
          {withDirector && (
            <td style={styles.td}>
              {row.director_name === null
                ? ''
                : `${row.director_name}${row.is_current_director ? '' : ' (former)'}`}
            </td>
          )}
          {withDirector && <td style={styles.td}>{row.director_start_date ?? ''}</td>}
        </tr>
      ))}
    </tbody>
  </table>
);
