/**
 * Shared inline styles. The rendered documents carry no stylesheet links, so
 * everything is expressed as style objects.
 */

export const colors = {
  text: '#1a1a2e',
  muted: '#6b7280',
  border: '#e5e7eb',
  surface: '#ffffff',
  background: '#f6f9fc',
  accent: '#2563eb',
  warning: '#b45309',
  warningBackground: '#fffbeb',
  error: '#b91c1c',
  errorBackground: '#fef2f2',
  high: '#b91c1c',
  moderate: '#b45309',
  low: '#047857',
};

export const fontFamily =
  '-apple-system, BlinkMacSystemFont, "Segoe UI", Roboto, "Helvetica Neue", Ubuntu, sans-serif';

export const styles = {
  body: {
    backgroundColor: colors.background,
    fontFamily,
    color: colors.text,
    margin: '0',
    padding: '0',
  },
  container: {
    backgroundColor: colors.surface,
    margin: '24px auto',
    padding: '24px 32px',
    maxWidth: '1080px',
    borderRadius: '8px',
  },
  title: {
    fontSize: '26px',
    fontWeight: '700',
    margin: '0 0 8px',
  },
  sectionHeading: {
    fontSize: '18px',
    fontWeight: '600',
    margin: '24px 0 12px',
  },
  muted: {
    color: colors.muted,
    fontSize: '13px',
    margin: '0 0 4px',
  },
  placeholder: {
    color: colors.muted,
    fontStyle: 'italic' as const,
    fontSize: '14px',
    padding: '16px',
    border: `1px dashed ${colors.border}`,
    borderRadius: '6px',
  },
  notice: {
    color: colors.warning,
    backgroundColor: colors.warningBackground,
    padding: '10px 14px',
    borderRadius: '6px',
    fontSize: '14px',
    margin: '0 0 8px',
  },
  errorNotice: {
    color: colors.error,
    backgroundColor: colors.errorBackground,
    padding: '10px 14px',
    borderRadius: '6px',
    fontSize: '14px',
    margin: '0 0 8px',
  },
  hr: {
    borderColor: colors.border,
    margin: '24px 0',
  },
  table: {
    width: '100%',
    borderCollapse: 'collapse' as const,
    fontSize: '13px',
  },
  th: {
    textAlign: 'left' as const,
    padding: '6px 8px',
    borderBottom: `2px solid ${colors.border}`,
    whiteSpace: 'nowrap' as const,
  },
  td: {
    padding: '6px 8px',
    borderBottom: `1px solid ${colors.border}`,
  },
  tdNumber: {
    padding: '6px 8px',
    borderBottom: `1px solid ${colors.border}`,
    textAlign: 'right' as const,
    whiteSpace: 'nowrap' as const,
  },
};
