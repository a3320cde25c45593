import { describe, it, expect } from 'vitest';
import { renderToStaticMarkup } from 'react-dom/server';
import { linkifyText } from '../src/lib/linkify';
import { serializeForScript } from '../src/lib/serialize';

describe('linkifyText', () => {
  it('should return plain text untouched', () => {
    expect(linkifyText('no links here')).toEqual(['no links here']);
  });

  it('should add a scheme to www. links', () => {
    expect(renderToStaticMarkup(<p>{linkifyText('see www.example.com now')}</p>)).toBe(
      '<p>see <a href="https://www.example.com" target="_blank" rel="noopener noreferrer">www.example.com</a> now</p>'
    );
  });

  it('should link several URLs in order', () => {
    const nodes = linkifyText('http://a.example and https://b.example');
    expect(nodes).toHaveLength(3);
    expect(nodes[1]).toBe(' and ');
  });
});

describe('serializeForScript', () => {
  it('should escape every angle bracket opener', () => {
    expect(serializeForScript({ html: '<b>' })).toBe('{"html":"\\u003cb>"}');
  });
});
