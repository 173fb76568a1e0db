import { COLORS, GAME_HEIGHT, GAME_WIDTH, HOME_BUTTON, LANE_WIDTH, RESTART_BUTTON } from '../constants';
import { CarSnapshot, Entity, GameSnapshot, Rect, kindColor, kindShape } from '../types';

export type SceneContext = Pick<
    CanvasRenderingContext2D,
    | 'fillStyle'
    | 'strokeStyle'
    | 'lineWidth'
    | 'font'
    | 'textAlign'
    | 'textBaseline'
    | 'clearRect'
    | 'fillRect'
    | 'strokeRect'
    | 'beginPath'
    | 'moveTo'
    | 'lineTo'
    | 'stroke'
    | 'arc'
    | 'fill'
    | 'fillText'
    | 'save'
    | 'restore'
    | 'translate'
    | 'rotate'
>;

const CENTER_X = GAME_WIDTH / 2;

const drawLanes = (ctx: SceneContext) => {
    ctx.fillStyle = COLORS.background;
    ctx.fillRect(0, 0, GAME_WIDTH, GAME_HEIGHT);

    ctx.strokeStyle = COLORS.laneLine;
    for (let lane = 1; lane < 4; lane++) {
        // Thick divider between the two cars' halves
        ctx.lineWidth = lane === 2 ? 4 : 1;
        ctx.beginPath();
        ctx.moveTo(lane * LANE_WIDTH, 0);
        ctx.lineTo(lane * LANE_WIDTH, GAME_HEIGHT);
        ctx.stroke();
    }
};

const drawCar = (ctx: SceneContext, car: CarSnapshot) => {
    const color = COLORS[car.color];
    ctx.save();
    ctx.translate(car.x + car.width / 2, car.y + car.height / 2);
    ctx.rotate((car.angle * Math.PI) / 180);

    ctx.fillStyle = color;
    ctx.fillRect(-car.width / 2, -car.height / 2, car.width, car.height);
    // Windscreen
    ctx.fillStyle = COLORS.background;
    ctx.fillRect(-car.width / 2 + 6, -car.height / 2 + 12, car.width - 12, 12);

    ctx.restore();
};

const drawObstacle = (ctx: SceneContext, entity: Entity) => {
    const color = COLORS[kindColor(entity.kind)];
    if (kindShape(entity.kind) === 'box') {
        ctx.fillStyle = color;
        ctx.fillRect(entity.x, entity.y, entity.width, entity.height);
        ctx.strokeStyle = COLORS.text;
        ctx.lineWidth = 3;
        ctx.strokeRect(entity.x + 8, entity.y + 8, entity.width - 16, entity.height - 16);
        return;
    }

    const radius = entity.width / 2;
    ctx.fillStyle = color;
    ctx.beginPath();
    ctx.arc(entity.x + radius, entity.y + radius, radius, 0, Math.PI * 2);
    ctx.fill();
    ctx.fillStyle = COLORS.text;
    ctx.beginPath();
    ctx.arc(entity.x + radius, entity.y + radius, radius / 3, 0, Math.PI * 2);
    ctx.fill();
};

const drawText = (ctx: SceneContext, text: string, x: number, y: number, size: number, align: CanvasTextAlign = 'center') => {
    ctx.fillStyle = COLORS.text;
    ctx.font = `bold ${size}px 'Orbitron', sans-serif`;
    ctx.textAlign = align;
    ctx.textBaseline = 'middle';
    ctx.fillText(text, x, y);
};

const drawButton = (ctx: SceneContext, rect: Rect, label: string) => {
    ctx.strokeStyle = COLORS.text;
    ctx.lineWidth = 2;
    ctx.strokeRect(rect.x, rect.y, rect.width, rect.height);
    drawText(ctx, label, rect.x + rect.width / 2, rect.y + rect.height / 2, 14);
};

const drawMenu = (ctx: SceneContext, snapshot: GameSnapshot) => {
    drawText(ctx, 'TWIN LANES', CENTER_X, 240, 40);
    drawText(ctx, 'Press Any Key', CENTER_X, 360 + snapshot.menuTextOffset, 22);
    drawText(ctx, 'to Play', CENTER_X, 390 + snapshot.menuTextOffset, 22);
    if (snapshot.highscore > 0) {
        drawText(ctx, `Highscore: ${snapshot.highscore}`, CENTER_X, 470, 16);
    }
};

const drawGameOver = (ctx: SceneContext, snapshot: GameSnapshot) => {
    ctx.fillStyle = COLORS.overlay;
    ctx.fillRect(0, 0, GAME_WIDTH, GAME_HEIGHT);

    drawText(ctx, 'GAME OVER', CENTER_X, 200, 36);
    drawText(ctx, `Score: ${snapshot.score}`, CENTER_X, 260, 20);
    drawText(ctx, `Highscore: ${snapshot.highscore}`, CENTER_X, 290, 20);
    drawButton(ctx, RESTART_BUTTON, 'Restart (R)');
    drawButton(ctx, HOME_BUTTON, 'Home (H)');
};

/** Paints one frame from a snapshot. Stateless apart from the context. */
export const drawScene = (ctx: SceneContext, snapshot: GameSnapshot): void => {
    ctx.clearRect(0, 0, GAME_WIDTH, GAME_HEIGHT);
    drawLanes(ctx);

    snapshot.obstacles.forEach(entity => drawObstacle(ctx, entity));
    drawCar(ctx, snapshot.cars.blue);
    drawCar(ctx, snapshot.cars.red);

    switch (snapshot.screen) {
        case 'MAIN_MENU':
            drawMenu(ctx, snapshot);
            break;
        case 'PLAYING':
            drawText(ctx, `${snapshot.score}`, GAME_WIDTH - 20, 40, 28, 'right');
            break;
        case 'GAME_OVER':
            drawGameOver(ctx, snapshot);
            break;
    }
};
