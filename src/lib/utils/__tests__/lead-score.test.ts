import { scoreLead } from '../lead-score';

describe('scoreLead', () => {
  it('adds every bonus for a complete lead', () => {
    expect(scoreLead({ email: 'a@b.com', phone: '5551234567', message: 'x'.repeat(90) })).toBe(40);
  });

  it('gives nothing for a short phone alone', () => {
    expect(scoreLead({ email: null, phone: '123', message: null })).toBe(0);
  });

  it('gives 10 for an email alone', () => {
    expect(scoreLead({ email: 'a@b.com' })).toBe(10);
  });

  it('ignores an empty email', () => {
    expect(scoreLead({ email: '' })).toBe(0);
  });

  it('accepts a phone of exactly ten characters', () => {
    expect(scoreLead({ phone: '9981234567' })).toBe(20);
  });

  it('needs a message longer than 80 characters', () => {
    expect(scoreLead({ message: 'x'.repeat(80) })).toBe(0);
    expect(scoreLead({ message: 'x'.repeat(81) })).toBe(10);
  });

  it('counts accented characters once', () => {
    expect(scoreLead({ message: 'é'.repeat(81) })).toBe(10);
  });
});
