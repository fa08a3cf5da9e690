import { frames, parseControlFrame } from './realtime-message.model';

describe('parseControlFrame', () => {
  it('should read a revoke frame', () => {
    const raw = frames.control({ type: '__control', action: 'revoke', jti: 'jti-1' });

    expect(parseControlFrame(raw)).toEqual({ type: '__control', action: 'revoke', jti: 'jti-1' });
  });

  it('should ignore regular messages', () => {
    expect(parseControlFrame('{"type":"notification","body":"hi"}')).toBeNull();
    expect(parseControlFrame('plain text')).toBeNull();
  });

  it('should ignore control frames it does not understand', () => {
    expect(parseControlFrame('{"type":"__control","action":"reload"}')).toBeNull();
    expect(parseControlFrame('{"type":"__control","action":"revoke"}')).toBeNull();
    expect(parseControlFrame('__control {')).toBeNull();
  });
});
