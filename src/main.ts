import App from './control/app';
import { GraphicsSetupError } from './core';
import { MeshAssetError } from './model/meshAsset';

const canvas = document.getElementById('gfx-main');
const status = document.getElementById('status');

function showError(message: string): void {
    if (status) {
        status.textContent = message;
    }
}

void (async () => {
    if (!(canvas instanceof HTMLCanvasElement)) {
        console.error('❌ Missing #gfx-main canvas');
        return;
    }

    const app = new App(canvas);
    try {
        await app.init();
    } catch (error) {
        console.error('❌ Failed to start the viewer:', error);
        if (error instanceof GraphicsSetupError || error instanceof MeshAssetError) {
            showError(error.message);
        } else {
            showError('Failed to start the viewer, see the console for details');
        }
        return;
    }

    app.run();
    console.log('🎯 Viewer running: hold the left mouse button to look, WASD / Space / Shift to move, F11 fullscreen, Esc quits');
})();
