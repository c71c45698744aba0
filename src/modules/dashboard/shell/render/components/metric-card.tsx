import { Column, Text } from '@react-email/components';
// eslint-disable-next-line @typescript-eslint/naming-convention -- React is a third-party naming standard
import * as React from 'react';

import { colors } from '../styles.js';

export interface MetricCardProps {
  label: string;
  /** Already formatted */
  value: string;
}

const styles = {
  card: {
    border: `1px solid ${colors.border}`,
    borderRadius: '8px',
    padding: '14px',
    textAlign: 'center' as const,
    verticalAlign: 'top' as const,
  },
  label: {
    fontSize: '12px',
    fontWeight: '600',
    color: colors.muted,
    textTransform: 'uppercase' as const,
    letterSpacing: '0.5px',
    margin: '0 0 6px',
  },
  value: {
    fontSize: '22px',
    fontWeight: '700',
    color: colors.accent,
    margin: '0',
    lineHeight: '1.2',
  },
};

export const MetricCard = ({ label, value }: MetricCardProps): React.ReactElement => (
  <Column style={styles.card}>
    <Text style={styles.label}>{label}</Text>
    <Text style={styles.value}>{value}</Text>
  </Column>
);
