/**
 * Report Template
 *
 * Standalone HTML document for the report export.
 */

import { Body, Container, Head, Heading, Html, Text } from '@react-email/components';
// eslint-disable-next-line @typescript-eslint/naming-convention -- React is a third-party naming standard
import * as React from 'react';

import { ReportBody } from './components/report-body.js';
import { styles } from './styles.js';

import type { ReportDocument } from '../../core/types.js';

export const REPORT_TITLE = 'Complete Financial Dashboard Report';

export const ReportTemplate = ({ report }: { report: ReportDocument }): React.ReactElement => (
  <Html lang="en">
    <Head>
      <title>{REPORT_TITLE}</title>
    </Head>
    <Body style={styles.body}>
      <Container style={styles.container}>
        <Heading as="h1" style={styles.title}>
          {REPORT_TITLE}
        </Heading>
        <ReportBody report={report} />
        <Text style={styles.muted}>
          {'Figures cover only the departments this user is permitted to see.'}
        </Text>
      </Container>
    </Body>
  </Html>
);
