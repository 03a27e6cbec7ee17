import { ConfigService } from '@nestjs/config';
import { HistoryService } from './history.service';

describe('HistoryService', () => {
  let history: HistoryService;

  beforeEach(() => {
    history = new HistoryService(new ConfigService({ HISTORY_WINDOW: 4 }));
  });

  it('keeps turns in insertion order', () => {
    history.appendTurn('a', 'user', 'hi');
    history.appendTurn('a', 'assistant', 'hello');

    expect(history.getRecentTurns('a')).toEqual([
      { role: 'user', content: 'hi' },
      { role: 'assistant', content: 'hello' },
    ]);
  });

  it('evicts the oldest turns past the window', () => {
    for (let i = 1; i <= 6; i++) {
      history.appendTurn('a', i % 2 === 1 ? 'user' : 'assistant', `turn ${i}`);
    }

    expect(history.getRecentTurns('a').map((turn) => turn.content)).toEqual(['turn 3', 'turn 4', 'turn 5', 'turn 6']);
  });

  it('separates sessions and clears one', () => {
    history.appendTurn('a', 'user', 'from a');
    history.appendTurn('b', 'user', 'from b');

    history.clear('a');

    expect(history.getRecentTurns('a')).toEqual([]);
    expect(history.getRecentTurns('b')).toEqual([{ role: 'user', content: 'from b' }]);
  });

  it('hands out copies', () => {
    history.appendTurn('a', 'user', 'hi');
    history.getRecentTurns('a').push({ role: 'user', content: 'injected' });

    expect(history.getRecentTurns('a')).toHaveLength(1);
  });
});
