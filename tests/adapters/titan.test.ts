import { describe, it, expect } from 'vitest';
import { extractTitanDetails } from '../../src/adapters/titan.js';

describe('extractTitanDetails', () => {
  it('reads every known field', () => {
    const html = `
      <div class="job-description">
        <p>Manage a panel of   adult patients.</p>
      </div>
      <span class="location">Denver, CO</span>
      <div class="compensation">$120,000 - $140,000</div>
      <div class="qualifications">Active NP license</div>
      <div class="company-info">Community health network</div>`;

    expect(extractTitanDetails(html)).toEqual({
      description: 'Manage a panel of adult patients.',
      location: 'Denver, CO',
      salary: '$120,000 - $140,000',
      requirements: 'Active NP license',
      company_info: 'Community health network',
    });
  });

  it('prefers earlier selectors over later ones', () => {
    const html = `
      <div class="job-details">Details block</div>
      <div class="description">Description block</div>`;

    expect(extractTitanDetails(html).description).toBe('Description block');
  });

  it('matches the description by id', () => {
    expect(extractTitanDetails('<div id="job-description">By id</div>')).toEqual({ description: 'By id' });
  });

  it('omits fields that are not on the page', () => {
    expect(extractTitanDetails('<main><h1>Nurse Practitioner</h1></main>')).toEqual({});
  });
});
