/**
 * Dashboard Page
 *
 * The interactive page as static HTML. Interaction is a plain GET form: every
 * change submits the whole selection back to the page route.
 */

import {
  Body,
  Container,
  Head,
  Heading,
  Hr,
  Html,
  Link,
  Section,
  Text,
} from '@react-email/components';
// eslint-disable-next-line @typescript-eslint/naming-convention -- React is a third-party naming standard
import * as React from 'react';

import { ReportBody } from './components/report-body.js';
import { TransactionsTable } from './components/transactions-table.js';
import { styles, colors } from './styles.js';
import { formatGeneratedAt } from '../../core/format.js';
import {
  RECORD_LIMITS,
  SORT_ORDERS,
  type DashboardView,
  type ViewerContext,
} from '../../core/types.js';
import { ALL_DEPARTMENTS, type Selection } from '../../../spending-analytics/core/types.js';

import type { DashboardLinks } from '../../core/ports.js';
import type { AccessSummary } from '../../../finance-data/core/types.js';

export const DASHBOARD_TITLE = 'University Financial Dashboard';

const RECORD_LABELS: Record<(typeof RECORD_LIMITS)[number], string> = {
  '50': '50 records',
  '100': '100 records',
  '500': '500 records',
  all: 'All records',
};

const SORT_LABELS: Record<(typeof SORT_ORDERS)[number], string> = {
  'date-desc': 'Date (newest first)',
  'date-asc': 'Date (oldest first)',
  'amount-desc': 'Amount (highest first)',
  'amount-asc': 'Amount (lowest first)',
};

const formStyles = {
  fieldset: {
    border: `1px solid ${colors.border}`,
    borderRadius: '6px',
    padding: '10px 14px',
    margin: '0 0 12px',
  },
  option: {
    display: 'inline-block',
    marginRight: '14px',
    fontSize: '14px',
  },
  button: {
    marginRight: '8px',
    fontSize: '13px',
  },
  control: {
    marginRight: '16px',
    fontSize: '14px',
  },
};

// ─────────────────────────────────────────────────────────────────────────────
// Viewer panel
// ─────────────────────────────────────────────────────────────────────────────

const accessLine = (access: AccessSummary): string => {
  switch (access.scope) {
    case 'multiple':
      return `Access to ${String(access.departments.length)} departments: ${access.departments.join(', ')}`;
    case 'single':
      return `Department: ${access.departments.join(', ')}`;
    case 'none':
      return 'No department-specific access';
  }
};

const ViewerPanel = ({ viewer }: { viewer: ViewerContext }): React.ReactElement => (
  <Section>
    {viewer.notices.map((notice) => (
      <Text key={notice} style={styles.errorNotice}>
        {notice}
      </Text>
    ))}
    <Text style={styles.muted}>{`Logged in as: ${viewer.currentUser}`}</Text>
    <Text style={styles.muted}>
      {viewer.access.accessLevel === null
        ? 'Access Level: none'
        : `Access Level: ${viewer.access.accessLevel}`}
    </Text>
    <Text style={styles.muted}>{accessLine(viewer.access)}</Text>
    {viewer.dataAsOf !== null && (
      <Text style={styles.muted}>{`Data as of ${formatGeneratedAt(viewer.dataAsOf)}`}</Text>
    )}
  </Section>
);

// ─────────────────────────────────────────────────────────────────────────────
// Filter form
// ─────────────────────────────────────────────────────────────────────────────

type FilterableView = Exclude<DashboardView, { kind: 'no-data' }>;

const ActionButton = ({ action, label }: { action: string; label: string }): React.ReactElement => (
  <button type="submit" name="action" value={action} style={formStyles.button}>
    {label}
  </button>
);

const SelectionFields = ({
  view,
  selection,
}: {
  view: FilterableView;
  selection: Selection;
}): React.ReactElement => (
  <>
    <input type="hidden" name="submitted" value="true" />

    <fieldset style={formStyles.fieldset}>
      <legend>{'Fiscal Years'}</legend>
      {view.options.years.map((year) => (
        <label key={year} style={formStyles.option}>
          <input
            type="checkbox"
            name="years"
            value={String(year)}
            defaultChecked={selection.years.has(year)}
          />
          {` ${String(year)}`}
        </label>
      ))}
      <div>
        <ActionButton action="select-all-years" label="Select All" />
        <ActionButton action="deselect-all-years" label="Deselect All" />
      </div>
    </fieldset>

    <fieldset style={formStyles.fieldset}>
      <legend>{'Expenditure Categories'}</legend>
      {view.options.categories.map((category) => (
        <label key={category} style={formStyles.option}>
          <input
            type="checkbox"
            name="categories"
            value={category}
            defaultChecked={selection.categories.has(category)}
          />
          {` ${category}`}
        </label>
      ))}
      <div>
        <ActionButton action="select-all-categories" label="Select All" />
        <ActionButton action="deselect-all-categories" label="Deselect All" />
      </div>
    </fieldset>

    <label style={formStyles.control}>
      {'Department '}
      <select name="department" defaultValue={selection.department}>
        <option value={ALL_DEPARTMENTS}>{'All Departments'}</option>
        {view.options.departments.map((department) => (
          <option key={department} value={department}>
            {department}
          </option>
        ))}
      </select>
    </label>
  </>
);

const ReadyFields = ({
  view,
}: {
  view: Extract<DashboardView, { kind: 'ready' }>;
}): React.ReactElement => (
  <>
    <label style={formStyles.control}>
      {'Analysis Category '}
      <select name="analysisCategory" defaultValue={view.report.deepDive.category}>
        {view.analysisCategories.map((category) => (
          <option key={category} value={category}>
            {category}
          </option>
        ))}
      </select>
    </label>
    <label style={formStyles.control}>
      {'Show '}
      <select name="records" defaultValue={view.table.options.records}>
        {RECORD_LIMITS.map((limit) => (
          <option key={limit} value={limit}>
            {RECORD_LABELS[limit]}
          </option>
        ))}
      </select>
    </label>
    <label style={formStyles.control}>
      {'Sort by '}
      <select name="sort" defaultValue={view.table.options.sort}>
        {SORT_ORDERS.map((order) => (
          <option key={order} value={order}>
            {SORT_LABELS[order]}
          </option>
        ))}
      </select>
    </label>
  </>
);

const FilterForm = ({
  view,
  action,
}: {
  view: FilterableView;
  action: string;
}): React.ReactElement => (
  <form method="get" action={action}>
    <SelectionFields view={view} selection={view.selection} />
    {view.kind === 'ready' && <ReadyFields view={view} />}
    <button type="submit" style={formStyles.button}>
      {'Apply'}
    </button>
  </form>
);

// ─────────────────────────────────────────────────────────────────────────────
// Content
// ─────────────────────────────────────────────────────────────────────────────

const Content = ({
  view,
  links,
}: {
  view: DashboardView;
  links: DashboardLinks;
}): React.ReactElement => {
  switch (view.kind) {
    case 'no-data':
      return <Text style={styles.notice}>{view.message}</Text>;
    case 'invalid-selection':
      return (
        <>
          <FilterForm view={view} action={links.page} />
          <Text style={styles.errorNotice}>{view.message}</Text>
        </>
      );
    case 'empty-filter':
      return (
        <>
          <FilterForm view={view} action={links.page} />
          <Text style={styles.notice}>{view.message}</Text>
        </>
      );
    case 'ready':
      return (
        <>
          <FilterForm view={view} action={links.page} />
          <Hr style={styles.hr} />
          <ReportBody report={view.report} />
          <Hr style={styles.hr} />
          <Heading as="h2" style={styles.sectionHeading}>
            {view.table.title}
          </Heading>
          <Text style={styles.muted}>{view.table.caption}</Text>
          <Text>
            <Link href={links.csvExport}>{'Download CSV'}</Link>
            {' | '}
            <Link href={links.reportExport}>{'Download Complete Report (HTML)'}</Link>
          </Text>
          <TransactionsTable rows={view.table.rows} withDirector />
        </>
      );
  }
};

// ─────────────────────────────────────────────────────────────────────────────
// Page
// ─────────────────────────────────────────────────────────────────────────────

export interface DashboardPageProps {
  view: DashboardView;
  links: DashboardLinks;
}

export const DashboardPage = ({ view, links }: DashboardPageProps): React.ReactElement => (
  <Html lang="en">
    <Head>
      <title>{DASHBOARD_TITLE}</title>
    </Head>
    <Body style={styles.body}>
      <Container style={styles.container}>
        <Heading as="h1" style={styles.title}>
          {DASHBOARD_TITLE}
        </Heading>
        <ViewerPanel viewer={view.viewer} />
        <Hr style={styles.hr} />
        <Content view={view} links={links} />
      </Container>
    </Body>
  </Html>
);
