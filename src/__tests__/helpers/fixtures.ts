/**
 * Test Fixtures
 * Reusable test data
 */

import type { PageRecord } from '../../lib/crawling';

export const testHtml = `
<!DOCTYPE html>
<html>
<head>
  <title>  Test School  </title>
  <style>body { color: red; }</style>
</head>
<body>
  <h1>Welcome</h1>
  <h2>Admissions</h2>
  <h2>Fees</h2>
  <p>Test paragraph
     content.</p>
  <div class="main-content">
    <p>Main <b>content</b> area.</p>
  </div>
  <a href="/about">About</a>
  <a href="https://other.test/page">Elsewhere</a>
  <a href="mailto:office@example.com">Mail</a>
  <a href="javascript:void(0)">Noop</a>
  <a href="/about">About again</a>
  <script>console.log('test');</script>
</body>
</html>
`;

export function makePage(overrides: Partial<PageRecord> & Pick<PageRecord, 'id'>): PageRecord {
  return {
    url: `https://school.test/${overrides.id}`,
    title: 'Page',
    headers: {},
    data: `Body of ${overrides.id}`,
    links: [],
    scrapedAt: '2024-05-01T10:00:00.000Z',
    ...overrides,
  };
}

export const listingHtml = `
<html><body>
  <div class="card-row">
    <h2 class="card-row-title"><a href="/schools/ais-tokyo">AIS Tokyo</a></h2>
    <div class="card-row-content"> An international school. </div>
    <div class="card-row-properties">
      <dl>
        <dd>Curriculum</dd><dt>IB</dt>
        <dd>Language</dd><dt>English</dt>
        <dd>Ages</dd><dt>3 - 18</dt>
        <dd>Fees</dd><dt>2,000,000 JPY</dt>
      </dl>
    </div>
  </div>
  <div class="card-row">
    <h2 class="card-row-title"><a href="https://other.test/schools/bay">Bay School</a></h2>
    <div class="card-row-properties">
      <dl>
        <dd>Fees</dd><dt>Not available</dt>
      </dl>
    </div>
  </div>
  <div class="card-row"></div>
</body></html>
`;

export const detailHtml = `
<html><body>
  <div id="detailed-answers">
    <div class="panel">
      <div class="panel-heading"><i class="icon"></i> General </div>
      <div class="panel-body">
        <table>
          <tr><td class="question">Founded</td><td class="answer"> 1990 </td></tr>
          <tr><td class="question">Students</td><td class="answer">500</td></tr>
          <tr><td class="question">Orphan question</td></tr>
        </table>
      </div>
    </div>
    <div class="panel">
      <div class="panel-heading"><i></i>Admissions</div>
      <div class="panel-body">
        <table>
          <tr><td class="question">Waiting list</td><td class="answer">Yes</td></tr>
        </table>
      </div>
    </div>
    <div class="panel">
      <div class="panel-body"><table><tr><td class="question">Q</td><td class="answer">A</td></tr></table></div>
    </div>
  </div>
</body></html>
`;
